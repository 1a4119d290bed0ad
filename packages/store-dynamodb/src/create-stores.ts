import {
  resolveDocumentClient,
  type DynamoDBClientOption,
} from './document-client.js';
import {
  DynamoDBCacheStore,
  type DynamoDBCacheStoreOptions,
} from './dynamodb-cache-store.js';
import {
  DynamoDBRateLimitStore,
  type DynamoDBRateLimitStoreOptions,
} from './dynamodb-rate-limit-store.js';
import { DEFAULT_TABLE_NAME } from './table.js';

type SharedOptions = 'client' | 'region' | 'tableName';

export interface CreateDynamoDBStoresOptions {
  /** Shared by both stores and left open on close. Created when omitted. */
  client?: DynamoDBClientOption;
  region?: string;
  /** Defaults to `'sandbox-kit'`. */
  tableName?: string;
  cache?: Omit<DynamoDBCacheStoreOptions, SharedOptions>;
  rateLimit?: Omit<DynamoDBRateLimitStoreOptions, SharedOptions>;
}

export interface DynamoDBStores {
  cache: DynamoDBCacheStore;
  rateLimit: DynamoDBRateLimitStore;
  close(): Promise<void>;
}

/**
 * Both stores on one table and one client. A client created here is
 * destroyed by `close()`; one passed in is not.
 */
export function createDynamoDBStores({
  client,
  region,
  tableName = DEFAULT_TABLE_NAME,
  cache: cacheOptions,
  rateLimit: rateLimitOptions,
}: CreateDynamoDBStoresOptions = {}): DynamoDBStores {
  const { docClient, tableClient, owned } = resolveDocumentClient(
    client,
    region,
  );
  // The limiter gets the low-level client so it can create the table.
  const shared = { tableName, region };
  const cache = new DynamoDBCacheStore({
    ...cacheOptions,
    ...shared,
    client: docClient,
  });
  const rateLimit = new DynamoDBRateLimitStore({
    ...rateLimitOptions,
    ...shared,
    client: tableClient ?? docClient,
  });

  return {
    cache,
    rateLimit,
    async close() {
      await Promise.all([cache.close(), rateLimit.close()]);
      owned?.destroy();
    },
  };
}
