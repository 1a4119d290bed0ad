import { openDatabase } from './open-database.js';
import type { SQLiteDatabaseOption } from './schema.js';
import {
  SQLiteCacheStore,
  type SQLiteCacheStoreOptions,
} from './sqlite-cache-store.js';
import {
  SQLiteRateLimitStore,
  type SQLiteRateLimitStoreOptions,
} from './sqlite-rate-limit-store.js';

export interface CreateSQLiteStoresOptions {
  /**
   * File path opened in WAL mode, or a connection the caller keeps
   * ownership of. Defaults to `':memory:'`.
   */
  database?: SQLiteDatabaseOption;
  cache?: Omit<SQLiteCacheStoreOptions, 'database'>;
  rateLimit?: Omit<SQLiteRateLimitStoreOptions, 'database'>;
}

export interface SQLiteStores {
  cache: SQLiteCacheStore;
  rateLimit: SQLiteRateLimitStore;
  close(): Promise<void>;
}

/**
 * Both stores on a single connection. The stores borrow it; `close()` shuts
 * it only when it was opened here from a path.
 */
export function createSQLiteStores({
  database,
  cache: cacheOptions,
  rateLimit: rateLimitOptions,
}: CreateSQLiteStoresOptions = {}): SQLiteStores {
  const { db, owned } = openDatabase(database);

  const cache = new SQLiteCacheStore({ ...cacheOptions, database: db });
  const rateLimit = new SQLiteRateLimitStore({
    ...rateLimitOptions,
    database: db,
  });

  return {
    cache,
    rateLimit,
    async close() {
      await Promise.all([cache.close(), rateLimit.close()]);
      if (owned && db.open) {
        db.close();
      }
    },
  };
}
