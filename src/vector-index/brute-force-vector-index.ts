import { Logger } from '@nestjs/common';
import { IndexCapacityError } from '../common/errors/pipeline.errors';
import { OperationAbortedError } from '../common/utils/retry';
import { cosineSimilarity, normalize } from '../common/utils/vector-math';
import { matchesFilters } from './filters';
import {
  IndexPoint,
  VectorIndex,
  VectorIndexStats,
  VectorSearchHit,
  VectorSearchRequest,
} from './interfaces/vector-index.interface';
import { rankHits } from './ranking';

export interface BruteForceVectorIndexOptions {
  capacity: number;
  /** Expected vector length; unchecked when omitted */
  dimension?: number;
}

// how many points are scored between cancellation checks
const ABORT_CHECK_INTERVAL = 1024;

/**
 * Exact in-memory index. Scores every point that passes the filters, so
 * results are the ground truth the approximate index is tested against.
 */
export class BruteForceVectorIndex implements VectorIndex {
  private readonly logger = new Logger(BruteForceVectorIndex.name);
  private readonly points = new Map<string, Readonly<IndexPoint>>();

  constructor(private readonly options: BruteForceVectorIndexOptions) {}

  async ready(): Promise<void> {
    return;
  }

  async insert(point: IndexPoint): Promise<void> {
    if (
      this.options.dimension !== undefined &&
      point.vector.length !== this.options.dimension
    ) {
      throw new RangeError(
        `Vector for point ${point.id} has ${point.vector.length} dimensions, expected ${this.options.dimension}`,
      );
    }

    if (
      !this.points.has(point.id) &&
      this.points.size >= this.options.capacity
    ) {
      throw new IndexCapacityError(this.options.capacity, {
        segmentId: point.metadata.segmentId,
      });
    }

    // readers only ever see a complete, frozen record
    const stored: Readonly<IndexPoint> = Object.freeze({
      id: point.id,
      vector: normalize(point.vector),
      metadata: Object.freeze({ ...point.metadata }),
    });
    this.points.set(point.id, stored);
  }

  async remove(id: string): Promise<boolean> {
    return this.points.delete(id);
  }

  async search(request: VectorSearchRequest): Promise<VectorSearchHit[]> {
    const { queryVector, filters, topK, scoreThreshold, signal } = request;
    const startTime = Date.now();
    const query = normalize(queryVector);
    const candidates: VectorSearchHit[] = [];
    let scanned = 0;

    for (const point of this.points.values()) {
      if (scanned++ % ABORT_CHECK_INTERVAL === 0 && signal?.aborted) {
        throw new OperationAbortedError('Vector search');
      }
      if (!matchesFilters(point.metadata, filters)) {
        continue;
      }
      candidates.push({
        id: point.id,
        score: cosineSimilarity(query, point.vector),
        metadata: { ...point.metadata },
      });
    }

    const hits = rankHits(candidates, topK, scoreThreshold);
    this.logger.debug(
      `Exact search scored ${candidates.length}/${this.points.size} points in ${Date.now() - startTime}ms, returning ${hits.length}`,
    );
    return hits;
  }

  async count(): Promise<number> {
    return this.points.size;
  }

  async stats(): Promise<VectorIndexStats> {
    return {
      backend: 'memory',
      pointCount: this.points.size,
      capacity: this.options.capacity,
      annIndexBuilt: false,
    };
  }
}
