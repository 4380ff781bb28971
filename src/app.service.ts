import { Inject, Injectable } from '@nestjs/common';
import { AnomalyEngineService } from './anomalies/anomaly-engine.service';
import { EmbeddingCache } from './embedding/embedding-cache';
import {
  QUERY_EMBEDDING_CACHE,
  SEGMENT_EMBEDDING_CACHE,
} from './embedding/interfaces/embedding-cache.interface';
import { EmbeddingProviderFactory } from './providers/embedding-provider.factory';
import { SearchResultCacheService } from './search/search-result-cache.service';
import { SegmentIndexService } from './segments/segment-index.service';
import { SegmentRegistryService } from './segments/segment-registry.service';
import { TrackCorrelatorService } from './tracking/track-correlator.service';
import {
  VECTOR_INDEX,
  VectorIndex,
} from './vector-index/interfaces/vector-index.interface';

@Injectable()
export class AppService {
  constructor(
    @Inject(VECTOR_INDEX) private readonly vectorIndex: VectorIndex,
    @Inject(SEGMENT_EMBEDDING_CACHE)
    private readonly segmentCache: EmbeddingCache,
    @Inject(QUERY_EMBEDDING_CACHE)
    private readonly queryCache: EmbeddingCache,
    private readonly searchCache: SearchResultCacheService,
    private readonly registry: SegmentRegistryService,
    private readonly segmentIndex: SegmentIndexService,
    private readonly tracking: TrackCorrelatorService,
    private readonly anomalyEngine: AnomalyEngineService,
    private readonly providers: EmbeddingProviderFactory,
  ) {}

  getHealth() {
    const providers = this.providers.getAvailableProviders();
    return {
      status: providers.some((p) => p.isAvailable) ? 'ok' : 'degraded',
      timestamp: new Date().toISOString(),
      service: 'segment-sentinel',
      version: '0.1.0',
      defaultProvider: this.providers.getDefaultProvider(),
      providers,
    };
  }

  async getStats() {
    const [index, segmentEmbeddings, queryEmbeddings] = await Promise.all([
      this.vectorIndex.stats(),
      this.segmentCache.stats(),
      this.queryCache.stats(),
    ]);

    return {
      index,
      embeddingCache: {
        segments: segmentEmbeddings,
        queries: queryEmbeddings,
      },
      searchCache: this.searchCache.stats(),
      segments: {
        registered: this.registry.count(),
        queuedForRetry: this.segmentIndex.queuedCount(),
      },
      tracking: this.tracking.stats(),
      anomalies: this.anomalyEngine.stats(),
    };
  }
}
