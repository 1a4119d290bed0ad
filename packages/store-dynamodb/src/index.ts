export { DynamoDBCacheStore } from './dynamodb-cache-store.js';
export { DynamoDBRateLimitStore } from './dynamodb-rate-limit-store.js';
export { createDynamoDBStores } from './create-stores.js';
export {
  DEFAULT_TABLE_NAME,
  TABLE_SCHEMA,
  TTL_ATTRIBUTE,
  createTable,
  describeTableStatus,
  ensureTable,
  waitForTable,
} from './table.js';
export { resolveDocumentClient } from './document-client.js';
export type { DynamoDBClientOption, ResolvedClient } from './document-client.js';
export type { TableWaitOptions } from './table.js';
export {
  isDynamoTableMissing,
  throwIfDynamoTableMissing,
} from './table-missing-error.js';
export type { DynamoDBCacheStoreOptions } from './dynamodb-cache-store.js';
export type { DynamoDBRateLimitStoreOptions } from './dynamodb-rate-limit-store.js';
export type {
  CreateDynamoDBStoresOptions,
  DynamoDBStores,
} from './create-stores.js';
export type { RateLimitConfig } from '@sandbox-kit/core';
export type { CacheStore, RateLimitStore } from '@sandbox-kit/core';
