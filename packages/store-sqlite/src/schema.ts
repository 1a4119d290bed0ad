import type Database from 'better-sqlite3';

export interface SQLiteTable {
  name: string;
  /** Idempotent DDL run when a store opens the database. */
  create: string;
}

export const cacheTable: SQLiteTable = {
  name: 'cache',
  create: `
    CREATE TABLE IF NOT EXISTS cache (
      hash TEXT PRIMARY KEY,
      value TEXT NOT NULL,
      expires_at INTEGER NOT NULL,
      created_at INTEGER NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_cache_expires_at ON cache (expires_at);
  `,
};

export const rateLimitTable: SQLiteTable = {
  name: 'rate_limits',
  create: `
    CREATE TABLE IF NOT EXISTS rate_limits (
      resource TEXT PRIMARY KEY,
      tokens REAL NOT NULL,
      last_refill INTEGER NOT NULL
    );
  `,
};

export type SQLiteDatabaseOption = string | Database.Database;

export function ensureTable(db: Database.Database, table: SQLiteTable): void {
  db.exec(table.create);
}
