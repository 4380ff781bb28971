import { Module } from '@nestjs/common';
import { MulterModule } from '@nestjs/platform-express';
import { AnomaliesModule } from '../anomalies/anomalies.module';
import { EmbeddingModule } from '../embedding/embedding.module';
import { VectorIndexModule } from '../vector-index/vector-index.module';
import { SegmentIndexService } from './segment-index.service';
import { SegmentRegistryService } from './segment-registry.service';
import { MAX_SEGMENT_BYTES, SegmentsController } from './segments.controller';

@Module({
  imports: [
    MulterModule.register({
      limits: {
        fileSize: MAX_SEGMENT_BYTES,
      },
    }),
    EmbeddingModule,
    VectorIndexModule,
    AnomaliesModule,
  ],
  controllers: [SegmentsController],
  providers: [SegmentRegistryService, SegmentIndexService],
  exports: [SegmentRegistryService, SegmentIndexService],
})
export class SegmentsModule {}
