import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { LanceDBModule } from '../lancedb/lancedb.module';
import { LanceDBService } from '../lancedb/lancedb.service';
import { getChoice, getNumber } from '../config/config.helpers';
import { BruteForceVectorIndex } from './brute-force-vector-index';
import { LanceDbVectorIndex } from './lancedb-vector-index';
import { VECTOR_INDEX, VectorIndex } from './interfaces/vector-index.interface';

export const VECTOR_INDEX_BACKENDS = ['lancedb', 'memory'] as const;

export function createVectorIndex(
  config: ConfigService,
  lancedbService: LanceDBService,
): VectorIndex {
  const backend = getChoice(
    config,
    'VECTOR_INDEX_BACKEND',
    VECTOR_INDEX_BACKENDS,
    'lancedb',
  );
  const capacity = getNumber(config, 'VECTOR_INDEX_MAX_POINTS', 1_000_000);
  const dimension = getNumber(config, 'EMBEDDING_DIMENSION', 1024);

  if (backend === 'memory') {
    return new BruteForceVectorIndex({ capacity, dimension });
  }

  return new LanceDbVectorIndex(lancedbService, {
    tableName: 'segment_vectors',
    capacity,
    dimension,
    annThreshold: getNumber(config, 'VECTOR_INDEX_ANN_THRESHOLD', 256),
    nprobes: getNumber(config, 'VECTOR_INDEX_NPROBES', 20),
    refineFactor: getNumber(config, 'VECTOR_INDEX_REFINE_FACTOR', 10),
  });
}

@Module({
  imports: [LanceDBModule],
  providers: [
    {
      provide: VECTOR_INDEX,
      useFactory: createVectorIndex,
      inject: [ConfigService, LanceDBService],
    },
  ],
  exports: [VECTOR_INDEX],
})
export class VectorIndexModule {}
