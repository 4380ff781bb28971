import { Module } from '@nestjs/common';
import { AnomaliesModule } from '../anomalies/anomalies.module';
import { TrackCorrelatorService } from './track-correlator.service';
import { TracksController } from './tracks.controller';

@Module({
  imports: [AnomaliesModule],
  controllers: [TracksController],
  providers: [TrackCorrelatorService],
  exports: [TrackCorrelatorService],
})
export class TrackingModule {}
