import {
  Body,
  Controller,
  Get,
  Param,
  Patch,
  Put,
  Query,
} from '@nestjs/common';
import { AnomalyStoreService } from './anomaly-store.service';
import { BaselineService } from './baseline.service';
import {
  ListAnomaliesQueryDto,
  SeedDwellBaselineDto,
  UpdateAnomalyStatusDto,
} from './dto';
import { Anomaly } from './interfaces/anomaly.interface';

function toEpoch(value?: string): number | undefined {
  return value === undefined ? undefined : Date.parse(value);
}

@Controller('anomalies')
export class AnomaliesController {
  constructor(
    private readonly store: AnomalyStoreService,
    private readonly baselines: BaselineService,
  ) {}

  @Get()
  list(@Query() query: ListAnomaliesQueryDto): Anomaly[] {
    return this.store.list({
      status: query.status,
      severity: query.severity,
      type: query.type,
      from: toEpoch(query.from),
      to: toEpoch(query.to),
      streamId: query.streamId,
      trackId: query.trackId,
    });
  }

  /**
   * Current dwell and movement baselines
   */
  @Get('baselines')
  getBaselines() {
    return this.baselines.describe();
  }

  @Put('baselines/dwell')
  seedDwell(@Body() dto: SeedDwellBaselineDto) {
    const averageMs = this.baselines.seedDwell(dto.location, dto.averageDwellMs);
    return { location: dto.location, averageMs };
  }

  @Get(':id')
  get(@Param('id') id: string): Anomaly {
    return this.store.get(id);
  }

  /**
   * Operator status transition, recorded in the status history
   */
  @Patch(':id/status')
  updateStatus(
    @Param('id') id: string,
    @Body() dto: UpdateAnomalyStatusDto,
  ): Anomaly {
    return this.store.updateStatus(id, dto.status, {
      actor: dto.actor,
      note: dto.note,
    });
  }
}
