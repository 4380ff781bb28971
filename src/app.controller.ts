import { Controller, Get } from '@nestjs/common';
import { AppService } from './app.service';

@Controller()
export class AppController {
  constructor(private readonly appService: AppService) {}

  @Get('health')
  getHealth() {
    return this.appService.getHealth();
  }

  /**
   * Index, cache, tracking and anomaly counters
   */
  @Get('stats')
  getStats() {
    return this.appService.getStats();
  }
}
