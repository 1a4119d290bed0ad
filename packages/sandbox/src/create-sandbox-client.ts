import {
  HttpClient,
  createLogger,
  resolveConfig,
  toRateLimitConfig,
  toRetryPolicy,
  type CacheStore,
  type FetchFn,
  type Logger,
  type RateLimitStore,
  type SandboxClientConfig,
  type SandboxClientConfigInput,
  type SleepFn,
  type StoreBackend,
} from '@sandbox-kit/core';
import {
  createDynamoDBStores,
  type DynamoDBStores,
} from '@sandbox-kit/store-dynamodb';
import {
  InMemoryCacheStore,
  InMemoryRateLimitStore,
} from '@sandbox-kit/store-memory';
import { createSQLiteStores, type SQLiteStores } from '@sandbox-kit/store-sqlite';
import type { Dispatcher } from 'undici';
import { SandboxClient, type Closeable } from './sandbox-client.js';

export interface SandboxClientOverrides {
  /** Used instead of the configured cache backend. Not closed by the client. */
  cache?: CacheStore;
  /** Used instead of the configured rate-limit backend. Not closed by the client. */
  rateLimit?: RateLimitStore;
  fetch?: FetchFn;
  dispatcher?: Dispatcher;
  logger?: Logger;
  sleep?: SleepFn;
  clock?: () => number;
  random?: () => number;
}

/**
 * Opens each persistent backend at most once, so a cache and a limiter on the
 * same backend share one database or table.
 */
class BackendPool {
  readonly owned: Array<Closeable> = [];
  private sqlite: SQLiteStores | undefined;
  private dynamodb: DynamoDBStores | undefined;

  constructor(private readonly config: SandboxClientConfig) {}

  cache(backend: StoreBackend): CacheStore {
    switch (backend) {
      case 'memory': {
        const store = new InMemoryCacheStore();
        this.owned.push({ close: async () => store.destroy() });
        return store;
      }
      case 'sqlite':
        return this.openSQLite().cache;
      case 'dynamodb':
        return this.openDynamoDB().cache;
    }
  }

  rateLimit(backend: StoreBackend): RateLimitStore {
    switch (backend) {
      case 'memory':
        return new InMemoryRateLimitStore({
          defaultConfig: toRateLimitConfig(this.config),
        });
      case 'sqlite':
        return this.openSQLite().rateLimit;
      case 'dynamodb':
        return this.openDynamoDB().rateLimit;
    }
  }

  private openSQLite(): SQLiteStores {
    if (!this.sqlite) {
      this.sqlite = createSQLiteStores({
        database: this.config.sqlitePath,
        rateLimit: { defaultConfig: toRateLimitConfig(this.config) },
      });
      this.owned.push(this.sqlite);
    }
    return this.sqlite;
  }

  private openDynamoDB(): DynamoDBStores {
    if (!this.dynamodb) {
      this.dynamodb = createDynamoDBStores({
        region: this.config.dynamoDbRegion,
        tableName: this.config.dynamoDbTableName,
        rateLimit: { defaultConfig: toRateLimitConfig(this.config) },
      });
      this.owned.push(this.dynamodb);
    }
    return this.dynamodb;
  }
}

/**
 * Validates the configuration, builds the configured stores and returns a
 * client that owns them.
 *
 * @throws {ValidationError} when the configuration is invalid.
 */
export function createSandboxClient(
  input: SandboxClientConfigInput,
  overrides: SandboxClientOverrides = {},
): SandboxClient {
  const config = resolveConfig(input);
  const logger =
    overrides.logger ??
    createLogger('SandboxClient', { level: config.logLevel });

  const pool = new BackendPool(config);
  const cache = config.cacheEnabled
    ? (overrides.cache ?? pool.cache(config.cacheBackend))
    : undefined;
  const rateLimit = config.rateLimitEnabled
    ? (overrides.rateLimit ?? pool.rateLimit(config.rateLimitBackend))
    : undefined;

  const http = new HttpClient(
    { cache, rateLimit },
    {
      name: 'SandboxClient',
      baseUrl: config.baseUrl,
      apiVersion: config.apiVersion,
      apiKey: config.apiKey,
      userAgent: config.userAgent,
      headers: { ...config.headers },
      timeoutMs: config.timeout * 1000,
      verifyTls: config.verifyTls,
      proxy: config.proxy,
      cache: {
        enabled: config.cacheEnabled,
        prefix: config.cachePrefix,
        defaultTtlSeconds: config.cacheTtl,
      },
      rateLimitEnabled: config.rateLimitEnabled,
      retry: config.retryEnabled ? toRetryPolicy(config) : false,
      fetch: overrides.fetch,
      dispatcher: overrides.dispatcher,
      logger,
      sleep: overrides.sleep,
      random: overrides.random,
    },
  );

  logger.debug(
    {
      cacheBackend: cache ? config.cacheBackend : 'disabled',
      rateLimitBackend: rateLimit ? config.rateLimitBackend : 'disabled',
    },
    'Sandbox client created',
  );

  return new SandboxClient(http, {
    logger,
    sleep: overrides.sleep,
    clock: overrides.clock,
    resources: pool.owned,
  });
}
