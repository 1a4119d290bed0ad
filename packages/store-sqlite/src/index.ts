export { SQLiteCacheStore } from './sqlite-cache-store.js';
export { SQLiteRateLimitStore } from './sqlite-rate-limit-store.js';
export { createSQLiteStores } from './create-stores.js';
export { openDatabase } from './open-database.js';
export type { OpenedDatabase } from './open-database.js';
export type {
  SQLiteCacheStoreOptions,
  SQLiteCacheStats,
} from './sqlite-cache-store.js';
export type { SQLiteRateLimitStoreOptions } from './sqlite-rate-limit-store.js';
export type {
  CreateSQLiteStoresOptions,
  SQLiteStores,
} from './create-stores.js';
export type { RateLimitConfig } from '@sandbox-kit/core';
export * from './schema.js';
export type { CacheStore, RateLimitStore } from '@sandbox-kit/core';
