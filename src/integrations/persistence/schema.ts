/**
 * SQLite Schema Definitions
 *
 * Migrations are embedded as code and tracked with `PRAGMA user_version`.
 * Every collection lives in one `documents` table as a JSON body; the
 * expression indexes cover the lookups the chat service makes.
 */

import type Database from 'better-sqlite3';

// =============================================================================
// TYPES
// =============================================================================

export interface Migration {
  /** Version number (must be unique and sequential) */
  version: number;
  name: string;
  /** SQL statements to execute (semicolon-separated) */
  sql: string;
}

export interface MigrationResult {
  applied: number;
  currentVersion: number;
  appliedMigrations: string[];
}

// =============================================================================
// EMBEDDED MIGRATIONS
// =============================================================================

export const MIGRATIONS: Migration[] = [
  {
    version: 1,
    name: 'documents',
    sql: `
      -- seq gives a stable insertion order for ties on any sort field
      CREATE TABLE IF NOT EXISTS documents (
        seq INTEGER PRIMARY KEY AUTOINCREMENT,
        id TEXT NOT NULL UNIQUE,
        collection TEXT NOT NULL,
        body TEXT NOT NULL,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_documents_collection ON documents(collection, seq);
    `,
  },
  {
    version: 2,
    name: 'session_indexes',
    sql: `
      CREATE INDEX IF NOT EXISTS idx_documents_session
        ON documents(collection, json_extract(body, '$.sessionId'));
      CREATE INDEX IF NOT EXISTS idx_documents_session_time
        ON documents(collection, json_extract(body, '$.sessionId'), json_extract(body, '$.timestamp'));
      CREATE INDEX IF NOT EXISTS idx_documents_message
        ON documents(collection, json_extract(body, '$.messageId'));
    `,
  },
];

// =============================================================================
// MIGRATION ENGINE
// =============================================================================

export function getSchemaVersion(db: Database.Database): number {
  const result = db.pragma('user_version', { simple: true });
  return typeof result === 'number' ? result : 0;
}

export function setSchemaVersion(db: Database.Database, version: number): void {
  db.pragma(`user_version = ${version}`);
}

function stripLeadingComments(sql: string): string {
  const lines = sql.split('\n');
  let startIndex = 0;

  while (startIndex < lines.length && /^\s*(--.*)?$/.test(lines[startIndex])) {
    startIndex++;
  }

  return lines.slice(startIndex).join('\n').trim();
}

function executeMigrationSql(db: Database.Database, sql: string): void {
  const statements = sql
    .split(';')
    .map((s) => stripLeadingComments(s.trim()))
    .filter((s) => s.length > 0);

  for (const statement of statements) {
    db.exec(statement);
  }
}

/**
 * Apply all pending migrations, each in its own transaction.
 */
export function applyMigrations(db: Database.Database): MigrationResult {
  const currentVersion = getSchemaVersion(db);
  const pending = MIGRATIONS.filter((m) => m.version > currentVersion);
  const applied: string[] = [];

  for (const migration of pending) {
    try {
      db.transaction(() => {
        executeMigrationSql(db, migration.sql);
        setSchemaVersion(db, migration.version);
      })();
      applied.push(migration.name);
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      throw new Error(`Migration ${migration.version}_${migration.name} failed: ${msg}`);
    }
  }

  return {
    applied: applied.length,
    currentVersion: getSchemaVersion(db),
    appliedMigrations: applied,
  };
}

export function getLatestSchemaVersion(): number {
  return MIGRATIONS.length > 0 ? MIGRATIONS[MIGRATIONS.length - 1].version : 0;
}
