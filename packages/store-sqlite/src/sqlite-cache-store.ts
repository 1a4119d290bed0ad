import {
  expiresAtFor,
  isExpired,
  type CacheStore,
} from '@sandbox-kit/core';
import type Database from 'better-sqlite3';
import { openDatabase } from './open-database.js';
import {
  cacheTable,
  ensureTable,
  type SQLiteDatabaseOption,
} from './schema.js';

export interface SQLiteCacheStoreOptions {
  /**
   * File path or an open `better-sqlite3` connection. A path is opened (and
   * later closed) by the store; a connection is borrowed. Defaults to
   * `':memory:'`.
   */
  database?: SQLiteDatabaseOption;
  /** Interval for sweeping expired rows. `0` disables the sweep. */
  cleanupIntervalMs?: number;
  now?: () => number;
}

export interface SQLiteCacheStats {
  totalItems: number;
  expiredItems: number;
  databaseSizeKB: number;
}

interface CacheRow {
  value: string;
  expires_at: number;
}

function isCacheRow(row: unknown): row is CacheRow {
  return (
    typeof row === 'object' &&
    row !== null &&
    'value' in row &&
    typeof row.value === 'string' &&
    'expires_at' in row &&
    typeof row.expires_at === 'number'
  );
}

function readCount(row: unknown, column: string): number {
  if (typeof row !== 'object' || row === null) {
    return 0;
  }
  const value: unknown = Reflect.get(row, column);
  return typeof value === 'number' ? value : 0;
}

export class SQLiteCacheStore<T = unknown> implements CacheStore<T> {
  private readonly db: Database.Database;
  private readonly isConnectionManaged: boolean;
  private readonly now: () => number;
  private cleanupInterval?: NodeJS.Timeout;
  private isDestroyed = false;

  constructor({
    database,
    cleanupIntervalMs = 60_000,
    now = Date.now,
  }: SQLiteCacheStoreOptions = {}) {
    const opened = openDatabase(database);
    this.db = opened.db;
    this.isConnectionManaged = opened.owned;
    this.now = now;
    ensureTable(this.db, cacheTable);

    if (cleanupIntervalMs > 0) {
      this.cleanupInterval = setInterval(() => {
        this.cleanup();
      }, cleanupIntervalMs);
      this.cleanupInterval.unref();
    }
  }

  async get(key: string): Promise<T | undefined> {
    this.assertNotDestroyed();

    const row: unknown = this.db
      .prepare('SELECT value, expires_at FROM cache WHERE hash = ?')
      .get(key);
    if (!isCacheRow(row)) {
      return undefined;
    }

    if (isExpired(row.expires_at, this.now())) {
      this.db.prepare('DELETE FROM cache WHERE hash = ?').run(key);
      return undefined;
    }

    // Values are wrapped so that `undefined` and `null` survive JSON.
    const wrapped: { value?: T } = JSON.parse(row.value);
    return wrapped.value;
  }

  async set(key: string, value: T, ttlSeconds?: number): Promise<void> {
    this.assertNotDestroyed();

    const now = this.now();
    this.db
      .prepare(
        `INSERT INTO cache (hash, value, expires_at, created_at)
         VALUES (?, ?, ?, ?)
         ON CONFLICT(hash) DO UPDATE SET
           value = excluded.value,
           expires_at = excluded.expires_at,
           created_at = excluded.created_at`,
      )
      .run(key, JSON.stringify({ value }), expiresAtFor(ttlSeconds, now), now);
  }

  async delete(key: string): Promise<void> {
    this.assertNotDestroyed();
    this.db.prepare('DELETE FROM cache WHERE hash = ?').run(key);
  }

  async exists(key: string): Promise<boolean> {
    this.assertNotDestroyed();

    const row: unknown = this.db
      .prepare('SELECT value, expires_at FROM cache WHERE hash = ?')
      .get(key);
    if (!isCacheRow(row)) {
      return false;
    }
    if (isExpired(row.expires_at, this.now())) {
      this.db.prepare('DELETE FROM cache WHERE hash = ?').run(key);
      return false;
    }
    return true;
  }

  async clear(): Promise<void> {
    this.assertNotDestroyed();
    this.db.prepare('DELETE FROM cache').run();
  }

  /**
   * Removes expired rows. Returns the number deleted.
   */
  cleanup(): number {
    if (this.isDestroyed) {
      return 0;
    }
    const result = this.db
      .prepare('DELETE FROM cache WHERE expires_at > 0 AND expires_at <= ?')
      .run(this.now());
    return result.changes;
  }

  async getStats(): Promise<SQLiteCacheStats> {
    this.assertNotDestroyed();

    const counts: unknown = this.db
      .prepare(
        `SELECT COUNT(*) AS total,
           COALESCE(SUM(CASE WHEN expires_at > 0 AND expires_at <= ? THEN 1 ELSE 0 END), 0) AS expired
         FROM cache`,
      )
      .get(this.now());
    const pageCount: unknown = this.db.pragma('page_count', { simple: true });
    const pageSize: unknown = this.db.pragma('page_size', { simple: true });

    return {
      totalItems: readCount(counts, 'total'),
      expiredItems: readCount(counts, 'expired'),
      databaseSizeKB:
        typeof pageCount === 'number' && typeof pageSize === 'number'
          ? (pageCount * pageSize) / 1024
          : 0,
    };
  }

  async close(): Promise<void> {
    this.destroy();
  }

  destroy(): void {
    if (this.isDestroyed) {
      return;
    }
    this.isDestroyed = true;

    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = undefined;
    }
    if (this.isConnectionManaged) {
      this.db.close();
    }
  }

  private assertNotDestroyed(): void {
    if (this.isDestroyed) {
      throw new Error('Cache store has been destroyed');
    }
  }
}
