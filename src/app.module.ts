import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AnomaliesModule } from './anomalies/anomalies.module';
import { AppController } from './app.controller';
import { AppService } from './app.service';
import { EmbeddingModule } from './embedding/embedding.module';
import { ProvidersModule } from './providers/providers.module';
import { SearchModule } from './search/search.module';
import { SegmentsModule } from './segments/segments.module';
import { TrackingModule } from './tracking/tracking.module';
import { VectorIndexModule } from './vector-index/vector-index.module';

@Module({
  imports: [
    // Load environment variables
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env.local', '.env'],
    }),
    // Embedding providers and the cached embedding pipeline
    ProvidersModule,
    EmbeddingModule,
    VectorIndexModule,
    // Segment ingestion and semantic search
    SegmentsModule,
    SearchModule,
    // Cross-camera tracking and behavioral anomalies
    TrackingModule,
    AnomaliesModule,
  ],
  controllers: [AppController],
  providers: [AppService],
})
export class AppModule {}
