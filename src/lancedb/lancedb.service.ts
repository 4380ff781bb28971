import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as lancedb from '@lancedb/lancedb';
import { getString } from '../config/config.helpers';
import { errorMessage, errorStack } from '../common/utils/errors';

// Type aliases for LanceDB
export type Connection = Awaited<ReturnType<typeof lancedb.connect>>;
export type Table = Awaited<ReturnType<Connection['createTable']>>;

export interface EnsuredTable {
  table: Table;
  /** True when this call created the table from its seed rows */
  seeded: boolean;
}

/**
 * Owns the LanceDB connection shared by the vector index and the
 * persistent embedding cache. Tables are created on first write because
 * LanceDB infers their schema from the first rows.
 */
@Injectable()
export class LanceDBService implements OnModuleDestroy {
  private readonly logger = new Logger(LanceDBService.name);
  private db: Connection | null = null;
  private connecting: Promise<Connection> | null = null;
  private readonly pendingTables = new Map<string, Promise<EnsuredTable>>();
  readonly dbPath: string;

  constructor(private readonly configService: ConfigService) {
    this.dbPath = getString(
      this.configService,
      'LANCEDB_PATH',
      './data/segment-vectors',
    );
  }

  onModuleDestroy() {
    if (this.db?.isOpen()) {
      this.db.close();
    }
    this.logger.log('LanceDB service shutting down');
  }

  /**
   * Connect once; concurrent callers share the same attempt
   */
  async getConnection(): Promise<Connection> {
    if (this.db) {
      return this.db;
    }
    if (!this.connecting) {
      this.connecting = this.connect().finally(() => {
        this.connecting = null;
      });
    }
    return this.connecting;
  }

  private async connect(): Promise<Connection> {
    this.logger.log(`Connecting to LanceDB at: ${this.dbPath}`);

    try {
      const db = await lancedb.connect(this.dbPath);
      this.db = db;
      this.logger.log('LanceDB connected');
      return db;
    } catch (error) {
      this.logger.error(
        `Failed to connect to LanceDB: ${errorMessage(error)}`,
        errorStack(error),
      );
      throw error;
    }
  }

  /**
   * Open a table if it already exists
   */
  async openTable(name: string): Promise<Table | null> {
    const db = await this.getConnection();
    const tableNames = await db.tableNames();
    if (!tableNames.includes(name)) {
      return null;
    }
    return db.openTable(name);
  }

  /**
   * Open the table, creating it from `seedRows` when missing. Concurrent
   * callers for the same table share one creation; only the creator sees
   * `seeded: true`, everyone else still has to write their own rows.
   */
  ensureTable(
    name: string,
    seedRows: Record<string, unknown>[],
  ): Promise<EnsuredTable> {
    const inFlight = this.pendingTables.get(name);
    if (inFlight) {
      return inFlight.then(({ table }) => ({ table, seeded: false }));
    }

    const creation = this.openOrCreate(name, seedRows).finally(() => {
      this.pendingTables.delete(name);
    });
    this.pendingTables.set(name, creation);
    return creation;
  }

  private async openOrCreate(
    name: string,
    seedRows: Record<string, unknown>[],
  ): Promise<EnsuredTable> {
    const existing = await this.openTable(name);
    if (existing) {
      return { table: existing, seeded: false };
    }

    const db = await this.getConnection();
    try {
      const table = await db.createTable(name, seedRows);
      this.logger.log(`Created table ${name}`);
      return { table, seeded: true };
    } catch (error) {
      this.logger.error(
        `Failed to create table ${name}: ${errorMessage(error)}`,
        errorStack(error),
      );
      throw error;
    }
  }
}
