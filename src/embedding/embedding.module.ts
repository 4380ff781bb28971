import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { getChoice, getNumber } from '../config/config.helpers';
import { LanceDBModule } from '../lancedb/lancedb.module';
import { LanceDBService } from '../lancedb/lancedb.service';
import { ProvidersModule } from '../providers/providers.module';
import { EmbeddingCache } from './embedding-cache';
import { EmbeddingPipelineService } from './embedding-pipeline.service';
import {
  EmbeddingCacheStore,
  QUERY_EMBEDDING_CACHE,
  SEGMENT_EMBEDDING_CACHE,
} from './interfaces/embedding-cache.interface';
import { InMemoryEmbeddingCacheStore } from './stores/in-memory-embedding-cache.store';
import { LanceDbEmbeddingCacheStore } from './stores/lancedb-embedding-cache.store';

const DAY_MS = 24 * 60 * 60 * 1000;
const HOUR_MS = 60 * 60 * 1000;

export const EMBEDDING_CACHE_BACKENDS = ['memory', 'lancedb'] as const;

export function createSegmentEmbeddingCache(
  config: ConfigService,
  lancedbService: LanceDBService,
): EmbeddingCache {
  const backend = getChoice(
    config,
    'EMBEDDING_CACHE_BACKEND',
    EMBEDDING_CACHE_BACKENDS,
    'memory',
  );
  const store: EmbeddingCacheStore =
    backend === 'lancedb'
      ? new LanceDbEmbeddingCacheStore(lancedbService, 'embedding_cache')
      : new InMemoryEmbeddingCacheStore(
          getNumber(config, 'EMBEDDING_CACHE_MAX_ENTRIES', 50000),
        );

  return new EmbeddingCache({
    name: 'segments',
    ttlMs: getNumber(config, 'EMBEDDING_CACHE_TTL_MS', 7 * DAY_MS),
    store,
  });
}

export function createQueryEmbeddingCache(config: ConfigService): EmbeddingCache {
  return new EmbeddingCache({
    name: 'queries',
    ttlMs: getNumber(config, 'QUERY_EMBEDDING_TTL_MS', HOUR_MS),
    store: new InMemoryEmbeddingCacheStore(
      getNumber(config, 'SEARCH_CACHE_MAX_ENTRIES', 1000),
    ),
  });
}

@Module({
  imports: [LanceDBModule, ProvidersModule],
  providers: [
    {
      provide: SEGMENT_EMBEDDING_CACHE,
      useFactory: createSegmentEmbeddingCache,
      inject: [ConfigService, LanceDBService],
    },
    {
      provide: QUERY_EMBEDDING_CACHE,
      useFactory: createQueryEmbeddingCache,
      inject: [ConfigService],
    },
    EmbeddingPipelineService,
  ],
  exports: [
    EmbeddingPipelineService,
    SEGMENT_EMBEDDING_CACHE,
    QUERY_EMBEDDING_CACHE,
  ],
})
export class EmbeddingModule {}
