import type { Logger } from 'pino';
import { createLogger } from '../logging/logger.js';
import type { CacheStore } from '../stores/cache-store.js';
import { buildCacheKey } from './cache-key.js';
import { NoopCacheStore } from './noop-cache-store.js';

export interface ResponseCacheOptions {
  /** When false the cache is permanently empty. Defaults to true. */
  enabled?: boolean;
  /** Namespace prepended to every key. Defaults to `sandbox:`. */
  prefix?: string;
  /** TTL in seconds applied when `set` is called without one. Defaults to 300. */
  defaultTtlSeconds?: number;
  logger?: Logger;
}

export const DEFAULT_CACHE_PREFIX = 'sandbox:';
export const DEFAULT_CACHE_TTL_SECONDS = 300;

/**
 * Wraps a {@link CacheStore} with key namespacing, a default TTL and an
 * on/off switch. Backend failures are logged and read as a miss; they never
 * fail the request that triggered them.
 */
export class ResponseCache<T = unknown> {
  readonly enabled: boolean;
  readonly prefix: string;
  readonly defaultTtlSeconds: number;
  private readonly store: CacheStore<T>;
  private readonly logger: Logger;

  constructor(store: CacheStore<T> | undefined, options: ResponseCacheOptions = {}) {
    this.enabled = (options.enabled ?? true) && store !== undefined;
    this.store = this.enabled && store ? store : new NoopCacheStore<T>();
    this.prefix = options.prefix ?? DEFAULT_CACHE_PREFIX;
    this.defaultTtlSeconds =
      options.defaultTtlSeconds ?? DEFAULT_CACHE_TTL_SECONDS;
    this.logger = options.logger ?? createLogger('ResponseCache');
  }

  buildKey(operation: string, args: unknown): string {
    return buildCacheKey(operation, args, this.prefix);
  }

  async get(key: string): Promise<T | undefined> {
    if (!this.enabled) {
      return undefined;
    }
    try {
      const value = await this.store.get(key);
      this.logger.debug({ key, hit: value !== undefined }, 'Cache lookup');
      return value;
    } catch (error) {
      this.logger.warn({ key, err: error }, 'Cache get failed; treating as miss');
      return undefined;
    }
  }

  async set(key: string, value: T, ttlSeconds?: number): Promise<void> {
    if (!this.enabled) {
      return;
    }
    try {
      await this.store.set(key, value, ttlSeconds ?? this.defaultTtlSeconds);
    } catch (error) {
      this.logger.warn({ key, err: error }, 'Cache set failed');
    }
  }

  async delete(key: string): Promise<void> {
    if (!this.enabled) {
      return;
    }
    try {
      await this.store.delete(key);
    } catch (error) {
      this.logger.warn({ key, err: error }, 'Cache delete failed');
    }
  }

  async exists(key: string): Promise<boolean> {
    if (!this.enabled) {
      return false;
    }
    try {
      return await this.store.exists(key);
    } catch (error) {
      this.logger.warn({ key, err: error }, 'Cache exists check failed');
      return false;
    }
  }

  /** Clears the whole backing store. Failures propagate. */
  async clear(): Promise<void> {
    if (this.enabled) {
      await this.store.clear();
    }
  }
}
