import {
  expiresAtFor,
  isExpired,
  type CacheStore,
} from '@sandbox-kit/core';

export interface InMemoryCacheStoreOptions {
  /** Upper bound on stored entries; the least recently used is evicted first. */
  maxItems?: number;
  /** Wall clock in ms, injectable for tests. */
  now?: () => number;
}

interface CacheItem<T> {
  value: T;
  /** 0 means no expiry. */
  expiresAt: number;
}

export interface InMemoryCacheStats {
  totalItems: number;
  /** Entries past their expiry that have not been read since. */
  expired: number;
  maxItems: number;
  itemUtilization: number;
}

/**
 * Map-backed cache. Expiry is lazy: an expired entry is dropped when it is
 * next read, and until then still counts towards `maxItems`.
 */
export class InMemoryCacheStore<T = unknown> implements CacheStore<T> {
  // Map iteration order doubles as recency order: oldest first.
  private readonly items = new Map<string, CacheItem<T>>();
  private readonly maxItems: number;
  private readonly now: () => number;
  private isDestroyed = false;

  constructor({ maxItems = 1000, now = Date.now }: InMemoryCacheStoreOptions = {}) {
    this.maxItems = maxItems;
    this.now = now;
  }

  async get(key: string): Promise<T | undefined> {
    this.assertUsable();

    const item = this.items.get(key);
    if (!item) {
      return undefined;
    }

    if (isExpired(item.expiresAt, this.now())) {
      this.items.delete(key);
      return undefined;
    }

    this.items.delete(key);
    this.items.set(key, item);
    return item.value;
  }

  async set(key: string, value: T, ttlSeconds?: number): Promise<void> {
    this.assertUsable();

    this.items.delete(key);
    this.items.set(key, { value, expiresAt: expiresAtFor(ttlSeconds, this.now()) });
    this.enforceMaxItems();
  }

  async delete(key: string): Promise<void> {
    this.assertUsable();
    this.items.delete(key);
  }

  async exists(key: string): Promise<boolean> {
    this.assertUsable();

    const item = this.items.get(key);
    if (!item) {
      return false;
    }
    if (isExpired(item.expiresAt, this.now())) {
      this.items.delete(key);
      return false;
    }
    return true;
  }

  async clear(): Promise<void> {
    this.assertUsable();
    this.items.clear();
  }

  getStats(): InMemoryCacheStats {
    const now = this.now();
    let expired = 0;
    for (const item of this.items.values()) {
      if (isExpired(item.expiresAt, now)) {
        expired++;
      }
    }

    return {
      totalItems: this.items.size,
      expired,
      maxItems: this.maxItems,
      itemUtilization: this.maxItems > 0 ? this.items.size / this.maxItems : 0,
    };
  }

  destroy(): void {
    this.items.clear();
    this.isDestroyed = true;
  }

  private enforceMaxItems(): void {
    while (this.items.size > this.maxItems) {
      const oldest = this.items.keys().next();
      if (oldest.done) {
        return;
      }
      this.items.delete(oldest.value);
    }
  }

  private assertUsable(): void {
    if (this.isDestroyed) {
      throw new Error('Cache store has been destroyed');
    }
  }
}
