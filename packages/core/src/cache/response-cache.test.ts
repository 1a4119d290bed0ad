import { pino } from 'pino';
import { describe, it, expect, vi } from 'vitest';
import type { CacheStore } from '../stores/cache-store.js';
import { ResponseCache } from './response-cache.js';

class MapStore implements CacheStore {
  readonly entries = new Map<string, { value: unknown; ttl?: number }>();

  async get(key: string): Promise<unknown> {
    return this.entries.get(key)?.value;
  }

  async set(key: string, value: unknown, ttlSeconds?: number): Promise<void> {
    this.entries.set(key, { value, ttl: ttlSeconds });
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  async exists(key: string): Promise<boolean> {
    return this.entries.has(key);
  }

  async clear(): Promise<void> {
    this.entries.clear();
  }
}

class BrokenStore implements CacheStore {
  private fail(): never {
    throw new Error('backend down');
  }

  async get(): Promise<unknown> {
    return this.fail();
  }

  async set(): Promise<void> {
    this.fail();
  }

  async delete(): Promise<void> {
    this.fail();
  }

  async exists(): Promise<boolean> {
    return this.fail();
  }

  async clear(): Promise<void> {
    this.fail();
  }
}

const silent = pino({ level: 'silent' });

describe('ResponseCache', () => {
  it('applies the default TTL when none is given', async () => {
    const store = new MapStore();
    const cache = new ResponseCache(store, {
      defaultTtlSeconds: 120,
      logger: silent,
    });

    await cache.set('k', { a: 1 });
    await cache.set('j', { b: 2 }, 5);

    expect(store.entries.get('k')).toEqual({ value: { a: 1 }, ttl: 120 });
    expect(store.entries.get('j')).toEqual({ value: { b: 2 }, ttl: 5 });
    await expect(cache.get('k')).resolves.toEqual({ a: 1 });
    await expect(cache.exists('j')).resolves.toBe(true);
  });

  it('builds keys with the configured prefix', () => {
    const cache = new ResponseCache(new MapStore(), {
      prefix: 'test:',
      logger: silent,
    });

    expect(cache.buildKey('getEnvironment', {})).toMatch(
      /^test:getEnvironment:[0-9a-f]{64}$/,
    );
  });

  it('is permanently empty when disabled', async () => {
    const store = new MapStore();
    const setSpy = vi.spyOn(store, 'set');
    const cache = new ResponseCache(store, { enabled: false, logger: silent });

    await cache.set('k', 1);

    expect(cache.enabled).toBe(false);
    expect(setSpy).not.toHaveBeenCalled();
    await expect(cache.get('k')).resolves.toBeUndefined();
    await expect(cache.exists('k')).resolves.toBe(false);
  });

  it('is disabled when there is no store', async () => {
    const cache = new ResponseCache(undefined, { logger: silent });

    expect(cache.enabled).toBe(false);
    await expect(cache.get('k')).resolves.toBeUndefined();
  });

  it('treats backend failures as a miss and logs a warning', async () => {
    const logger = pino({ level: 'silent' });
    const warn = vi.spyOn(logger, 'warn');
    const cache = new ResponseCache(new BrokenStore(), { logger });

    await expect(cache.get('k')).resolves.toBeUndefined();
    await expect(cache.set('k', 1)).resolves.toBeUndefined();
    await expect(cache.delete('k')).resolves.toBeUndefined();
    await expect(cache.exists('k')).resolves.toBe(false);

    expect(warn).toHaveBeenCalledTimes(4);
  });

  it('lets clear failures through', async () => {
    const cache = new ResponseCache(new BrokenStore(), { logger: silent });

    await expect(cache.clear()).rejects.toThrow('backend down');
  });
});
