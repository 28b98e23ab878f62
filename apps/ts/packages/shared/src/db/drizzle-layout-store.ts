/**
 * Drizzle-based Layout Store
 *
 * Opens the desktop configurator's SQLite database, creates any missing tables
 * and performs the idempotent writes a sync run needs. Every operation is safe
 * to repeat: tables are created only if absent, default settings are inserted
 * only for missing keys, metadata is written only into an empty table and
 * revisions are upserted by id.
 */

import Database from 'better-sqlite3';
import { count, eq, sql } from 'drizzle-orm';
import { type BetterSQLite3Database, drizzle } from 'drizzle-orm/better-sqlite3';
import { getErrorMessage, StoreError, toError } from '../errors';
import { DEFAULT_CONFIG_ENTRIES, type DefaultConfigEntry } from './constants/default-config';
import { config, LAYOUT_STORE_TABLES, type LayoutStoreTable, metadata, revision } from './schema/layout-store-schema';
import { executeTransaction } from './transaction-helpers';

export interface StoredRevisionSummary {
  revisionId: string;
  size: number;
}

export interface LayoutStoreOptions {
  /** Log failed transactions */
  debug?: boolean;
  /**
   * Open an existing file without applying the schema; every write fails.
   * Used for inspection so that looking at a file never changes it.
   */
  readonly?: boolean;
}

export interface ConfigEntry {
  key: string;
  value: string | null;
}

/**
 * Exact DDL expected by the configurator; quoting and constraints included
 */
const LAYOUT_STORE_DDL = `
CREATE TABLE IF NOT EXISTS "config" (
  key TEXT,
  value TEXT
);
CREATE TABLE IF NOT EXISTS "metadata" (
  data BLOB
);
CREATE TABLE IF NOT EXISTS "heatmap" (
  revisionId TEXT NOT NULL UNIQUE,
  enabled boolean DEFAULT 0,
  data BLOB DEFAULT NULL
);
CREATE TABLE IF NOT EXISTS "revision" (
  revisionId TEXT NOT NULL UNIQUE,
  data BLOB DEFAULT NULL
);
CREATE TABLE IF NOT EXISTS "smart_layer" (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  app TEXT NOT NULL,
  layer INTEGER NOT NULL,
  layoutId TEXT NOT NULL,
  revisionId TEXT NOT NULL
);
CREATE TABLE IF NOT EXISTS "auth" (
  token TEXT NOT NULL UNIQUE,
  username TEXT NOT NULL
);
`;

function openDatabase(dbPath: string, readonly: boolean): Database.Database {
  try {
    return readonly ? new Database(dbPath, { readonly: true, fileMustExist: true }) : new Database(dbPath);
  } catch (error) {
    throw new StoreError(`Failed to open layout store at ${dbPath}: ${getErrorMessage(error)}`, toError(error));
  }
}

export class DrizzleLayoutStore {
  private sqlite: Database.Database;
  private db: BetterSQLite3Database;
  private closed = false;
  private debug: boolean;

  constructor(
    readonly dbPath: string,
    options: LayoutStoreOptions = {}
  ) {
    this.debug = options.debug ?? false;
    this.sqlite = openDatabase(dbPath, options.readonly ?? false);
    this.db = drizzle(this.sqlite);

    if (options.readonly) return;

    try {
      this.initializeSchema();
    } catch (error) {
      this.close();
      throw error;
    }
  }

  /**
   * Run a statement, converting driver failures into StoreError
   */
  private execute<T>(operationName: string, operation: () => T): T {
    if (this.closed) {
      throw new StoreError(`Cannot ${operationName}: layout store at ${this.dbPath} is closed`);
    }

    try {
      return operation();
    } catch (error) {
      if (error instanceof StoreError) throw error;
      throw new StoreError(`Failed to ${operationName}: ${getErrorMessage(error)}`, toError(error));
    }
  }

  /**
   * Create every table the configurator expects, leaving existing ones untouched.
   * The journal mode is left at the engine default because the file is shared.
   */
  private initializeSchema(): void {
    this.execute('apply layout store schema', () => {
      this.sqlite.exec(LAYOUT_STORE_DDL);
    });
  }

  // ===== CONFIG =====

  /**
   * Insert each default setting whose key is not present yet.
   * Existing values, including ones the configurator changed, are never touched.
   *
   * @returns keys inserted by this call
   */
  seedDefaultConfig(entries: readonly DefaultConfigEntry[] = DEFAULT_CONFIG_ENTRIES): string[] {
    return this.execute('seed default config', () =>
      executeTransaction(
        this.sqlite,
        () => {
          const inserted: string[] = [];
          for (const entry of entries) {
            const existing = this.db
              .select({ value: count() })
              .from(config)
              .where(eq(config.key, entry.key))
              .get();
            if ((existing?.value ?? 0) > 0) continue;

            this.db.insert(config).values({ key: entry.key, value: entry.value }).run();
            inserted.push(entry.key);
          }
          return inserted;
        },
        { debug: this.debug, operationName: 'seedDefaultConfig' }
      )
    );
  }

  getConfigValue(key: string): string | null {
    return this.execute('read config', () => {
      const row = this.db.select({ value: config.value }).from(config).where(eq(config.key, key)).get();
      return row?.value ?? null;
    });
  }

  getConfigEntries(): ConfigEntry[] {
    return this.execute('read config', () =>
      this.db
        .select({ key: config.key, value: config.value })
        .from(config)
        .orderBy(sql`rowid`)
        .all()
        .filter((row): row is ConfigEntry => row.key !== null)
    );
  }

  // ===== METADATA =====

  countMetadata(): number {
    return this.execute('count metadata', () => {
      const row = this.db.select({ value: count() }).from(metadata).get();
      return row?.value ?? 0;
    });
  }

  insertMetadata(data: Buffer): void {
    this.execute('insert metadata', () => {
      this.db.insert(metadata).values({ data }).run();
    });
  }

  getMetadata(): Buffer | null {
    return this.execute('read metadata', () => {
      const row = this.db.select({ data: metadata.data }).from(metadata).orderBy(sql`rowid`).limit(1).get();
      return row?.data ?? null;
    });
  }

  // ===== REVISIONS =====

  /**
   * Insert a revision, replacing the data of an existing row with the same id
   */
  upsertRevision(revisionId: string, data: Buffer): void {
    this.execute('upsert revision', () => {
      this.db
        .insert(revision)
        .values({ revisionId, data })
        .onConflictDoUpdate({
          target: revision.revisionId,
          set: { data },
        })
        .run();
    });
  }

  getRevision(revisionId: string): Buffer | null {
    return this.execute('read revision', () => {
      const row = this.db
        .select({ data: revision.data })
        .from(revision)
        .where(eq(revision.revisionId, revisionId))
        .get();
      return row?.data ?? null;
    });
  }

  listRevisions(): StoredRevisionSummary[] {
    return this.execute('list revisions', () =>
      this.db
        .select({
          revisionId: revision.revisionId,
          size: sql<number>`coalesce(length(${revision.data}), 0)`,
        })
        .from(revision)
        .orderBy(sql`rowid`)
        .all()
    );
  }

  // ===== INSPECTION =====

  /**
   * Row count of one of the store's tables
   */
  countTable(table: LayoutStoreTable): number {
    if (!LAYOUT_STORE_TABLES.includes(table)) {
      throw new StoreError(`Unknown layout store table: ${table}`);
    }
    return this.execute(`count ${table} rows`, () => {
      const row = this.sqlite.prepare(`SELECT count(*) AS total FROM "${table}"`).get();
      return typeof row === 'object' && row !== null && 'total' in row && typeof row.total === 'number'
        ? row.total
        : 0;
    });
  }

  /**
   * Names of the tables currently present in the file
   */
  listTables(): string[] {
    return this.execute('list tables', () =>
      this.sqlite
        .prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name")
        .pluck()
        .all()
        .filter((name): name is string => typeof name === 'string')
    );
  }

  /**
   * Release the connection; calling it again is a no-op
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.sqlite.close();
  }
}
