import { Logger } from '@nestjs/common';
import { LanceDBService, Table } from '../../lancedb/lancedb.service';
import {
  column,
  isRecord,
  readNumber,
  readString,
  sqlString,
} from '../../lancedb/lancedb.rows';
import {
  EmbeddingCacheEntry,
  EmbeddingCacheStore,
} from '../interfaces/embedding-cache.interface';

function toRow(entry: EmbeddingCacheEntry): Record<string, unknown> {
  return {
    fingerprint: entry.fingerprint,
    // stored as text: the cache is looked up by key, never searched
    vectorJson: JSON.stringify(entry.vector),
    createdAt: entry.createdAt,
    expiresAt: entry.expiresAt,
    contentDigest: entry.contentDigest ?? '',
  };
}

function parseVector(json: string): number[] {
  const parsed: unknown = JSON.parse(json);
  if (
    !Array.isArray(parsed) ||
    !parsed.every((value): value is number => typeof value === 'number')
  ) {
    throw new TypeError('Cached vector is not a numeric array');
  }
  return parsed;
}

function toEntry(row: unknown): EmbeddingCacheEntry {
  if (!isRecord(row)) {
    throw new TypeError('Unexpected embedding cache row');
  }
  const contentDigest = readString(row, 'contentDigest');
  return {
    fingerprint: readString(row, 'fingerprint'),
    vector: Object.freeze(parseVector(readString(row, 'vectorJson'))),
    createdAt: readNumber(row, 'createdAt'),
    expiresAt: readNumber(row, 'expiresAt'),
    contentDigest: contentDigest === '' ? undefined : contentDigest,
  };
}

/**
 * Embedding cache persisted in a LanceDB table, so paid-for embeddings
 * survive restarts
 */
export class LanceDbEmbeddingCacheStore implements EmbeddingCacheStore {
  private readonly logger = new Logger(LanceDbEmbeddingCacheStore.name);
  private table: Table | null = null;

  constructor(
    private readonly lancedbService: LanceDBService,
    private readonly tableName: string,
  ) {}

  async get(fingerprint: string): Promise<EmbeddingCacheEntry | null> {
    const table = await this.openTable();
    if (!table) {
      return null;
    }

    const rows = await table
      .query()
      .where(this.byFingerprint(fingerprint))
      .limit(1)
      .toArray();
    return rows.length > 0 ? toEntry(rows[0]) : null;
  }

  async set(entry: EmbeddingCacheEntry): Promise<void> {
    const row = toRow(entry);
    const existing = await this.openTable();
    if (!existing) {
      const { table, seeded } = await this.lancedbService.ensureTable(
        this.tableName,
        [row],
      );
      this.table = table;
      if (seeded) {
        return;
      }
    }

    await this.requireTable()
      .mergeInsert('fingerprint')
      .whenMatchedUpdateAll()
      .whenNotMatchedInsertAll()
      .execute([row]);
    this.logger.debug(`Stored embedding ${entry.fingerprint}`);
  }

  async delete(fingerprint: string): Promise<void> {
    const table = await this.openTable();
    if (table) {
      await table.delete(this.byFingerprint(fingerprint));
    }
  }

  async size(): Promise<number> {
    const table = await this.openTable();
    return table ? table.countRows() : 0;
  }

  private async openTable(): Promise<Table | null> {
    if (!this.table) {
      this.table = await this.lancedbService.openTable(this.tableName);
    }
    return this.table;
  }

  private requireTable(): Table {
    if (!this.table) {
      throw new Error(`Table ${this.tableName} is not open`);
    }
    return this.table;
  }

  private byFingerprint(fingerprint: string): string {
    return `${column('fingerprint')} = ${sqlString(fingerprint)}`;
  }
}
