import {
  DEFAULT_RATE_LIMIT,
  KeyedMutex,
  WaitingAcquirers,
  bucketStatus,
  createBucketState,
  isUnlimited,
  refillBucket,
  sleep as defaultSleep,
  takeToken,
  waitForToken,
  waitTimeMs,
  type AcquireOptions,
  type RateLimitConfig,
  type RateLimitConfigMap,
  type RateLimitStatus,
  type RateLimitStore,
  type SleepFn,
  type TakeTokenResult,
  type TokenBucketState,
} from '@sandbox-kit/core';
import type Database from 'better-sqlite3';
import { openDatabase } from './open-database.js';
import {
  ensureTable,
  rateLimitTable,
  type SQLiteDatabaseOption,
} from './schema.js';

export interface SQLiteRateLimitStoreOptions {
  /** File path or an open `better-sqlite3` connection. Defaults to `':memory:'`. */
  database?: SQLiteDatabaseOption;
  defaultConfig?: RateLimitConfig;
  resourceConfigs?: RateLimitConfigMap;
  /**
   * Wall clock in ms. Bucket rows outlive the process, so this must be an
   * epoch clock rather than a monotonic one.
   */
  clock?: () => number;
  sleep?: SleepFn;
}

interface BucketRow {
  tokens: number;
  last_refill: number;
}

function isBucketRow(row: unknown): row is BucketRow {
  return (
    typeof row === 'object' &&
    row !== null &&
    'tokens' in row &&
    typeof row.tokens === 'number' &&
    'last_refill' in row &&
    typeof row.last_refill === 'number'
  );
}

/**
 * Token-bucket limiter persisted in SQLite, one row per resource.
 *
 * Each refill-and-take runs in an immediate transaction, so processes sharing
 * the file never double-spend a token. Within one process waiters queue on
 * a per-resource lock and are served in arrival order; `check` refuses
 * while one of them is blocked.
 */
export class SQLiteRateLimitStore implements RateLimitStore {
  private readonly db: Database.Database;
  private readonly isConnectionManaged: boolean;
  private readonly defaultConfig: RateLimitConfig;
  private readonly resourceConfigs: RateLimitConfigMap;
  private readonly clock: () => number;
  private readonly sleep: SleepFn;
  private readonly mutex = new KeyedMutex();
  private readonly waiting = new WaitingAcquirers();
  private isDestroyed = false;

  constructor({
    database,
    defaultConfig = DEFAULT_RATE_LIMIT,
    resourceConfigs = new Map<string, RateLimitConfig>(),
    clock = Date.now,
    sleep = defaultSleep,
  }: SQLiteRateLimitStoreOptions = {}) {
    const opened = openDatabase(database);
    this.db = opened.db;
    this.isConnectionManaged = opened.owned;
    this.defaultConfig = defaultConfig;
    this.resourceConfigs = new Map(resourceConfigs);
    this.clock = clock;
    this.sleep = sleep;
    ensureTable(this.db, rateLimitTable);
  }

  async check(resource: string): Promise<boolean> {
    this.assertNotDestroyed();
    if (isUnlimited(this.getResourceConfig(resource))) {
      return true;
    }
    if (this.waiting.has(resource)) {
      return false;
    }
    return this.take(resource).consumed;
  }

  async acquire(resource: string, options: AcquireOptions = {}): Promise<void> {
    this.assertNotDestroyed();
    if (isUnlimited(this.getResourceConfig(resource))) {
      return;
    }
    const leave = this.waiting.has(resource)
      ? this.waiting.enter(resource)
      : undefined;
    try {
      await this.mutex.runExclusive(
        resource,
        () =>
          waitForToken(
            resource,
            () => {
              this.assertNotDestroyed();
              return this.take(resource);
            },
            options,
            this.sleep,
            this.waiting,
          ),
        options.signal,
      );
    } finally {
      leave?.();
    }
  }

  async reset(resource: string): Promise<void> {
    this.assertNotDestroyed();
    this.writeState(
      resource,
      createBucketState(this.getResourceConfig(resource), this.clock()),
    );
  }

  async getStatus(resource: string): Promise<RateLimitStatus> {
    this.assertNotDestroyed();
    const config = this.getResourceConfig(resource);
    const now = this.clock();
    return bucketStatus(this.readState(resource, config, now), config, now, now);
  }

  async getWaitTime(resource: string): Promise<number> {
    this.assertNotDestroyed();
    const config = this.getResourceConfig(resource);
    const now = this.clock();
    return waitTimeMs(
      refillBucket(this.readState(resource, config, now), config, now),
      config,
    );
  }

  setResourceConfig(resource: string, config: RateLimitConfig): void {
    this.resourceConfigs.set(resource, config);
  }

  getResourceConfig(resource: string): RateLimitConfig {
    return this.resourceConfigs.get(resource) ?? this.defaultConfig;
  }

  async close(): Promise<void> {
    this.destroy();
  }

  destroy(): void {
    if (this.isDestroyed) {
      return;
    }
    this.isDestroyed = true;
    if (this.isConnectionManaged) {
      this.db.close();
    }
  }

  private take(resource: string): TakeTokenResult {
    const config = this.getResourceConfig(resource);
    const transaction = this.db.transaction((): TakeTokenResult => {
      const now = this.clock();
      const result = takeToken(this.readState(resource, config, now), config, now);
      this.writeState(resource, result.state);
      return result;
    });
    return transaction.immediate();
  }

  private readState(
    resource: string,
    config: RateLimitConfig,
    now: number,
  ): TokenBucketState {
    const row: unknown = this.db
      .prepare('SELECT tokens, last_refill FROM rate_limits WHERE resource = ?')
      .get(resource);
    if (!isBucketRow(row)) {
      return createBucketState(config, now);
    }
    return { tokens: row.tokens, lastRefill: row.last_refill };
  }

  private writeState(resource: string, state: TokenBucketState): void {
    this.db
      .prepare(
        `INSERT INTO rate_limits (resource, tokens, last_refill)
         VALUES (?, ?, ?)
         ON CONFLICT(resource) DO UPDATE SET
           tokens = excluded.tokens,
           last_refill = excluded.last_refill`,
      )
      .run(resource, state.tokens, state.lastRefill);
  }

  private assertNotDestroyed(): void {
    if (this.isDestroyed) {
      throw new Error('Rate limit store has been destroyed');
    }
  }
}
