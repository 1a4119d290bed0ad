import type { CacheStore } from '../stores/cache-store.js';

/** A cache that never holds anything. */
export class NoopCacheStore<T = unknown> implements CacheStore<T> {
  async get(_key: string): Promise<T | undefined> {
    return undefined;
  }

  async set(_key: string, _value: T, _ttlSeconds?: number): Promise<void> {}

  async delete(_key: string): Promise<void> {}

  async exists(_key: string): Promise<boolean> {
    return false;
  }

  async clear(): Promise<void> {}
}
