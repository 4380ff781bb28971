import { Module } from '@nestjs/common';
import { AnomaliesController } from './anomalies.controller';
import { AnomalyEngineService } from './anomaly-engine.service';
import { AnomalyStoreService } from './anomaly-store.service';
import { BaselineService } from './baseline.service';

@Module({
  controllers: [AnomaliesController],
  providers: [AnomalyStoreService, BaselineService, AnomalyEngineService],
  exports: [AnomalyEngineService, AnomalyStoreService],
})
export class AnomaliesModule {}
