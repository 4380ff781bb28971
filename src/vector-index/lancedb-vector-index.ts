import { Logger } from '@nestjs/common';
import * as lancedb from '@lancedb/lancedb';
import { IndexCapacityError } from '../common/errors/pipeline.errors';
import { Semaphore } from '../common/utils/concurrency';
import { errorMessage } from '../common/utils/errors';
import { OperationAbortedError, raceAbort } from '../common/utils/retry';
import { normalize } from '../common/utils/vector-math';
import { LanceDBService, Table } from '../lancedb/lancedb.service';
import {
  column,
  isRecord,
  readBoolean,
  readNumber,
  readString,
  sqlString,
} from '../lancedb/lancedb.rows';
import { matchesFilters, toLanceDbWhere } from './filters';
import {
  IndexPoint,
  VectorIndex,
  VectorIndexStats,
  VectorSearchHit,
  VectorSearchRequest,
} from './interfaces/vector-index.interface';
import { rankHits } from './ranking';

export interface LanceDbVectorIndexOptions {
  tableName: string;
  capacity: number;
  dimension: number;
  /** Row count at which the IVF_PQ index is built */
  annThreshold: number;
  nprobes: number;
  refineFactor: number;
}

// extra rows fetched so equal scores at the cut-off can be re-ranked
const TIE_OVERFETCH = 16;

/**
 * A full page whose last row scores the same as the topK-th may have more
 * equal rows behind it. Rows arrive nearest first.
 */
export function tiesPastCutOff(
  fetched: readonly VectorSearchHit[],
  topK: number,
  limit: number,
): boolean {
  if (fetched.length < limit || fetched.length < topK) return false;
  return fetched[fetched.length - 1].score === fetched[topK - 1].score;
}

function toRow(point: IndexPoint): Record<string, unknown> {
  return {
    id: point.id,
    vector: normalize(point.vector),
    ...point.metadata,
  };
}

function toHit(row: unknown): VectorSearchHit {
  if (!isRecord(row)) {
    throw new TypeError('Unexpected LanceDB search row');
  }
  return {
    id: readString(row, 'id'),
    // cosine distance is 1 - similarity
    score: 1 - readNumber(row, '_distance'),
    metadata: {
      segmentId: readString(row, 'segmentId'),
      videoId: readString(row, 'videoId'),
      cameraId: readString(row, 'cameraId'),
      location: readString(row, 'location'),
      startTime: readNumber(row, 'startTime'),
      endTime: readNumber(row, 'endTime'),
      hasFaces: readBoolean(row, 'hasFaces'),
      hasVehicles: readBoolean(row, 'hasVehicles'),
      motionDetected: readBoolean(row, 'motionDetected'),
    },
  };
}

/**
 * Approximate index on a LanceDB table. Below the ANN threshold LanceDB
 * scans the table exactly; above it an IVF_PQ index is built and queries
 * are refined against the full vectors.
 *
 * Filters are applied as a pre-filter, so a restrictive filter still
 * returns up to topK matches.
 */
export class LanceDbVectorIndex implements VectorIndex {
  private readonly logger = new Logger(LanceDbVectorIndex.name);
  private table: Table | null = null;
  private opening: Promise<void> | null = null;
  private pointCount = 0;
  private annIndexBuilt = false;
  // one writer at a time keeps the capacity check exact
  private readonly writes = new Semaphore(1);

  constructor(
    private readonly lancedbService: LanceDBService,
    private readonly options: LanceDbVectorIndexOptions,
  ) {}

  ready(): Promise<void> {
    if (!this.opening) {
      this.opening = this.open().catch((error: unknown) => {
        this.opening = null;
        throw error;
      });
    }
    return this.opening;
  }

  private async open(): Promise<void> {
    const table = await this.lancedbService.openTable(this.options.tableName);
    if (!table) {
      this.logger.log(
        `Table ${this.options.tableName} will be created on first insert`,
      );
      return;
    }

    this.table = table;
    this.pointCount = await table.countRows();
    this.logger.log(
      `Opened existing table ${this.options.tableName} with ${this.pointCount} points`,
    );
  }

  async insert(point: IndexPoint): Promise<void> {
    if (point.vector.length !== this.options.dimension) {
      throw new RangeError(
        `Vector for point ${point.id} has ${point.vector.length} dimensions, expected ${this.options.dimension}`,
      );
    }
    await this.ready();

    await this.writes.run(async () => {
      const row = toRow(point);

      if (!this.table) {
        if (this.options.capacity < 1) {
          throw new IndexCapacityError(this.options.capacity, {
            segmentId: point.metadata.segmentId,
          });
        }
        const { table, seeded } = await this.lancedbService.ensureTable(
          this.options.tableName,
          [row],
        );
        this.table = table;
        if (seeded) {
          this.pointCount = 1;
          return;
        }
        this.pointCount = await table.countRows();
      }

      const table = this.table;
      const exists = await this.contains(table, point.id);
      if (!exists && this.pointCount >= this.options.capacity) {
        throw new IndexCapacityError(this.options.capacity, {
          segmentId: point.metadata.segmentId,
        });
      }

      await table
        .mergeInsert('id')
        .whenMatchedUpdateAll()
        .whenNotMatchedInsertAll()
        .execute([row]);

      if (!exists) {
        this.pointCount++;
      }
      await this.buildAnnIndexIfNeeded(table);
    });
  }

  async remove(id: string): Promise<boolean> {
    await this.ready();

    return this.writes.run(async () => {
      const table = this.table;
      if (!table || !(await this.contains(table, id))) {
        return false;
      }
      await table.delete(`${column('id')} = ${sqlString(id)}`);
      this.pointCount--;
      return true;
    });
  }

  async search(request: VectorSearchRequest): Promise<VectorSearchHit[]> {
    const { queryVector, filters, topK, scoreThreshold, signal } = request;
    await raceAbort(this.ready(), signal, 'Vector search');

    const table = this.table;
    if (!table) {
      return [];
    }
    if (signal?.aborted) {
      throw new OperationAbortedError('Vector search');
    }

    const startTime = Date.now();
    const where = toLanceDbWhere(filters);
    let limit = topK + TIE_OVERFETCH;
    let fetched: VectorSearchHit[] = [];

    // widen until the rows past the cut-off no longer share its score
    for (;;) {
      let query = table
        .vectorSearch(normalize(queryVector))
        .distanceType('cosine')
        .limit(limit);
      if (where) {
        query = query.where(where);
      }
      if (this.annIndexBuilt) {
        query = query
          .nprobes(this.options.nprobes)
          .refineFactor(this.options.refineFactor);
      }

      const rows = await raceAbort(query.toArray(), signal, 'Vector search');
      fetched = rows.map((row) => toHit(row));
      if (!tiesPastCutOff(fetched, topK, limit) || limit >= this.pointCount) {
        break;
      }
      limit *= 2;
    }

    const candidates = fetched.filter((hit) => matchesFilters(hit.metadata, filters));
    const hits = rankHits(candidates, topK, scoreThreshold);

    this.logger.debug(
      `LanceDB search returned ${fetched.length} rows in ${Date.now() - startTime}ms, keeping ${hits.length}`,
    );
    return hits;
  }

  async count(): Promise<number> {
    await this.ready();
    return this.pointCount;
  }

  async stats(): Promise<VectorIndexStats> {
    await this.ready();
    return {
      backend: 'lancedb',
      pointCount: this.pointCount,
      capacity: this.options.capacity,
      annIndexBuilt: this.annIndexBuilt,
    };
  }

  private async contains(table: Table, id: string): Promise<boolean> {
    return (await table.countRows(`${column('id')} = ${sqlString(id)}`)) > 0;
  }

  /**
   * Build the IVF_PQ index once the table is large enough to train it.
   * Until then, and if the build fails, queries run as exact scans.
   */
  private async buildAnnIndexIfNeeded(table: Table): Promise<void> {
    if (this.annIndexBuilt || this.pointCount < this.options.annThreshold) {
      return;
    }

    const count = this.pointCount;
    this.logger.log(`Creating IVF_PQ index on ${count} points...`);
    try {
      await table.createIndex('vector', {
        config: lancedb.Index.ivfPq({
          distanceType: 'cosine',
          numPartitions: Math.max(
            1,
            Math.min(Math.floor(Math.sqrt(count)), 256),
          ),
          numSubVectors:
            this.options.dimension % 16 === 0 ? 16 : undefined,
        }),
        replace: true,
      });
      this.annIndexBuilt = true;
      this.logger.log('Vector index created successfully');
    } catch (error) {
      this.logger.error(`Failed to create vector index: ${errorMessage(error)}`);
    }
  }
}
