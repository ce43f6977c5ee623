/**
 * SQLite Document Store
 *
 * `DocumentStore` over better-sqlite3. Each document is one row of the
 * `documents` table with a JSON body; filters, sorts and aggregates go
 * through `json_extract` with the JSON path bound as a parameter.
 *
 * @example
 * ```typescript
 * const store = createSqliteDocumentStore({ dbPath: ':memory:' });
 * await store.insert('messages', { sessionId: 's1', role: 'user', content: 'hi' });
 * ```
 */

import Database from 'better-sqlite3';
import { randomUUID } from 'node:crypto';
import { existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { StoreError } from '../../errors/index.js';
import type { Document, Filter, StoredDocument } from '../../types.js';
import { createComponentLogger } from '../utilities/logger.js';
import type {
  AggregateResult,
  AggregateSpec,
  DocumentStore,
  FindOptions,
  InsertEntry,
  UpsertResult,
} from './document-store.js';
import { applyMigrations, getLatestSchemaVersion, getSchemaVersion } from './schema.js';

const log = createComponentLogger('SqliteDocumentStore');

// =============================================================================
// TYPES
// =============================================================================

export interface SqliteStoreConfig {
  /** Path to SQLite database file, or ':memory:' */
  dbPath: string;
  /** Enable WAL mode (default: true, ignored for ':memory:') */
  walMode?: boolean;
}

interface DocumentRow {
  id: string;
  body: string;
}

type SqlParam = string | number | null;

const FIELD_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

// =============================================================================
// HELPERS
// =============================================================================

function fieldPath(field: string): string {
  if (!FIELD_PATTERN.test(field)) {
    throw new StoreError(`Invalid field name: ${field}`, 'query', { field });
  }
  return `$.${field}`;
}

function toSqlValue(value: string | number | boolean | null): SqlParam {
  if (typeof value === 'boolean') return value ? 1 : 0;
  return value;
}

function buildWhere(collection: string, filter: Filter = {}): { clause: string; params: SqlParam[] } {
  const conditions = ['collection = ?'];
  const params: SqlParam[] = [collection];

  for (const [field, value] of Object.entries(filter)) {
    if (value === null) {
      conditions.push('json_extract(body, ?) IS NULL');
      params.push(fieldPath(field));
    } else {
      conditions.push('json_extract(body, ?) = ?');
      params.push(fieldPath(field), toSqlValue(value));
    }
  }

  return { clause: conditions.join(' AND '), params };
}

function parseBody(row: DocumentRow): StoredDocument {
  const parsed: unknown = JSON.parse(row.body);
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new StoreError(`Corrupt document body for ${row.id}`, 'read', { id: row.id });
  }
  return { ...Object.fromEntries(Object.entries(parsed)), _id: row.id };
}

function stripId(document: Document): Document {
  const { _id: _ignored, ...rest } = document;
  return rest;
}

function numberOrNull(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

// =============================================================================
// STORE
// =============================================================================

export class SqliteDocumentStore implements DocumentStore {
  private db: Database.Database;
  private closed = false;

  constructor(config: SqliteStoreConfig) {
    const inMemory = config.dbPath === ':memory:';

    // better-sqlite3 requires the parent directory to exist
    if (!inMemory) {
      const dbDir = dirname(config.dbPath);
      if (!existsSync(dbDir)) {
        mkdirSync(dbDir, { recursive: true });
      }
    }

    this.db = new Database(config.dbPath);

    if (!inMemory && (config.walMode ?? true)) {
      this.db.pragma('journal_mode = WAL');
    }
  }

  /**
   * Apply pending migrations. Safe to call more than once.
   */
  initialize(): void {
    const before = getSchemaVersion(this.db);
    const result = applyMigrations(this.db);
    if (result.applied > 0) {
      log.debug('Applied migrations', {
        from: before,
        to: result.currentVersion,
        migrations: result.appliedMigrations,
      });
    }
  }

  get schemaVersion(): number {
    return getSchemaVersion(this.db);
  }

  get isInitialized(): boolean {
    return getSchemaVersion(this.db) >= getLatestSchemaVersion();
  }

  async find(collection: string, filter?: Filter, options: FindOptions = {}): Promise<StoredDocument[]> {
    return this.run('find', { collection }, () => this.findSync(collection, filter, options));
  }

  async findOne(collection: string, filter: Filter): Promise<StoredDocument | null> {
    return this.run('findOne', { collection }, () => this.findSync(collection, filter, { limit: 1 })[0] ?? null);
  }

  async count(collection: string, filter?: Filter): Promise<number> {
    return this.run('count', { collection }, () => {
      const { clause, params } = buildWhere(collection, filter);
      const row = this.db
        .prepare<SqlParam[], { total: number }>(`SELECT COUNT(*) AS total FROM documents WHERE ${clause}`)
        .get(...params);
      return row?.total ?? 0;
    });
  }

  async insert(collection: string, document: Document): Promise<string> {
    return this.run('insert', { collection }, () => this.insertSync(collection, document));
  }

  async insertMany(entries: InsertEntry[]): Promise<string[]> {
    return this.run('insertMany', { count: entries.length }, () =>
      this.db.transaction((batch: InsertEntry[]) =>
        batch.map((entry) => this.insertSync(entry.collection, entry.document)),
      )(entries),
    );
  }

  async upsert(
    collection: string,
    filter: Filter,
    set: Document,
    setOnInsert: Document = {},
  ): Promise<UpsertResult> {
    return this.run('upsert', { collection }, () =>
      this.db.transaction((): UpsertResult => {
        const existing = this.findSync(collection, filter, { limit: 1 })[0];
        if (!existing) {
          const id = this.insertSync(collection, { ...filter, ...setOnInsert, ...set });
          return { id, created: true };
        }

        const body = { ...stripId(existing), ...stripId(set) };
        this.db
          .prepare<SqlParam[]>('UPDATE documents SET body = ?, updated_at = ? WHERE id = ?')
          .run(JSON.stringify(body), new Date().toISOString(), existing._id);
        return { id: existing._id, created: false };
      })(),
    );
  }

  async aggregate(collection: string, spec: AggregateSpec): Promise<AggregateResult> {
    return this.run('aggregate', { collection }, () => {
      const sumFields = spec.sum ?? [];
      const avgFields = spec.avg ?? [];
      const { clause, params } = buildWhere(collection, spec.match);

      const selects = ['COUNT(*) AS total'];
      const selectParams: SqlParam[] = [];
      sumFields.forEach((field, i) => {
        selects.push(`TOTAL(json_extract(body, ?)) AS s${i}`);
        selectParams.push(fieldPath(field));
      });
      avgFields.forEach((field, i) => {
        selects.push(`AVG(json_extract(body, ?)) AS a${i}`);
        selectParams.push(fieldPath(field));
      });

      const row = this.db
        .prepare<SqlParam[], Record<string, unknown>>(
          `SELECT ${selects.join(', ')} FROM documents WHERE ${clause}`,
        )
        .get(...selectParams, ...params);

      const result: AggregateResult = { count: numberOrNull(row?.total) ?? 0, sum: {}, avg: {} };
      sumFields.forEach((field, i) => {
        result.sum[field] = numberOrNull(row?.[`s${i}`]) ?? 0;
      });
      avgFields.forEach((field, i) => {
        result.avg[field] = numberOrNull(row?.[`a${i}`]);
      });
      return result;
    });
  }

  async ping(): Promise<boolean> {
    if (this.closed) return false;
    try {
      this.db.prepare('SELECT 1').get();
      return true;
    } catch (err) {
      log.warn('Ping failed', { error: err instanceof Error ? err.message : String(err) });
      return false;
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.db.close();
  }

  // ---------------------------------------------------------------------------

  private findSync(collection: string, filter: Filter | undefined, options: FindOptions): StoredDocument[] {
    const { clause, params } = buildWhere(collection, filter);
    const orderParams: SqlParam[] = [];
    let order = 'seq ASC';

    if (options.sort) {
      const dir = options.sort.direction === 'desc' ? 'DESC' : 'ASC';
      order = `json_extract(body, ?) ${dir}, seq ${dir}`;
      orderParams.push(fieldPath(options.sort.field));
    }

    const limit = options.limit !== undefined && options.limit > 0 ? Math.floor(options.limit) : -1;
    const rows = this.db
      .prepare<SqlParam[], DocumentRow>(
        `SELECT id, body FROM documents WHERE ${clause} ORDER BY ${order} LIMIT ?`,
      )
      .all(...params, ...orderParams, limit);

    return rows.map(parseBody);
  }

  private insertSync(collection: string, document: Document): string {
    const id = typeof document._id === 'string' && document._id.length > 0 ? document._id : randomUUID();
    const now = new Date().toISOString();
    this.db
      .prepare<SqlParam[]>(
        'INSERT INTO documents (id, collection, body, created_at, updated_at) VALUES (?, ?, ?, ?, ?)',
      )
      .run(id, collection, JSON.stringify(stripId(document)), now, now);
    return id;
  }

  private run<T>(operation: string, context: Record<string, unknown>, fn: () => T): T {
    if (this.closed) {
      throw new StoreError('Store is closed', operation, context);
    }
    try {
      return fn();
    } catch (err) {
      if (err instanceof StoreError) throw err;
      throw StoreError.fromError(err, operation, context);
    }
  }
}

/**
 * Create and initialize a SQLite document store.
 */
export function createSqliteDocumentStore(config: SqliteStoreConfig): SqliteDocumentStore {
  const store = new SqliteDocumentStore(config);
  store.initialize();
  return store;
}
