import { RateLimitExceededError, type SleepFn } from '@sandbox-kit/core';
import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';
import { InMemoryRateLimitStore } from './in-memory-rate-limit-store.js';
import { TokenBucketRegistry } from './token-bucket-registry.js';

describe('InMemoryRateLimitStore', () => {
  let now: number;
  let registry: TokenBucketRegistry;
  let sleep: Mock<SleepFn>;
  const clock = () => now;

  const createStore = (rate = 2, burst = 3) =>
    new InMemoryRateLimitStore({
      defaultConfig: { rate, burst },
      registry,
      clock,
      sleep,
    });

  beforeEach(() => {
    now = 0;
    registry = new TokenBucketRegistry();
    // Advances the manual clock instead of waiting.
    sleep = vi.fn<SleepFn>(async (ms) => {
      now += ms;
      await Promise.resolve();
    });
  });

  describe('check', () => {
    it('allows exactly burst requests back to back', async () => {
      const store = createStore(2, 3);

      const results = [];
      for (let i = 0; i < 4; i++) {
        results.push(await store.check('analyze'));
      }

      expect(results).toEqual([true, true, true, false]);
    });

    it('allows exactly one more request 1/rate seconds after exhaustion', async () => {
      const store = createStore(2, 3);
      for (let i = 0; i < 3; i++) {
        await store.check('analyze');
      }

      now += 500;

      expect(await store.check('analyze')).toBe(true);
      expect(await store.check('analyze')).toBe(false);
    });

    it('never refills beyond burst', async () => {
      const store = createStore(2, 3);
      await store.check('analyze');

      now += 60_000;

      const status = await store.getStatus('analyze');
      expect(status.remaining).toBe(3);
    });

    it('keeps resources independent', async () => {
      const store = createStore(1, 1);

      expect(await store.check('analyze')).toBe(true);
      expect(await store.check('analyze')).toBe(false);
      expect(await store.check('list')).toBe(true);
    });

    it('grants concurrent checks while tokens remain', async () => {
      const store = createStore(1, 10);

      const results = await Promise.all([
        store.check('analyze'),
        store.check('analyze'),
        store.check('analyze'),
      ]);

      expect(results).toEqual([true, true, true]);
      expect((await store.getStatus('analyze')).remaining).toBe(7);
    });

    it('refuses while an acquirer is blocked, even once a token is back', async () => {
      let release: () => void = () => undefined;
      sleep.mockImplementationOnce(
        () =>
          new Promise<void>((resolve) => {
            release = resolve;
          }),
      );
      const store = createStore(1, 1);
      await store.check('analyze');

      const blocked = store.acquire('analyze');
      await vi.waitFor(() => expect(sleep).toHaveBeenCalledTimes(1));
      now += 1000;

      expect(await store.check('analyze')).toBe(false);

      release();
      await blocked;
      now += 1000;
      expect(await store.check('analyze')).toBe(true);
    });

    it('treats a non-positive rate as unlimited', async () => {
      const store = createStore(0, 0);

      for (let i = 0; i < 50; i++) {
        expect(await store.check('analyze')).toBe(true);
      }
      await store.acquire('analyze');
      expect(sleep).not.toHaveBeenCalled();
    });
  });

  describe('acquire', () => {
    it('returns immediately while tokens remain', async () => {
      const store = createStore(2, 3);

      await store.acquire('analyze');

      expect(sleep).not.toHaveBeenCalled();
      expect((await store.getStatus('analyze')).remaining).toBe(2);
    });

    it('waits for the next token when the bucket is empty', async () => {
      const store = createStore(2, 1);
      await store.acquire('analyze');

      await store.acquire('analyze');

      expect(sleep).toHaveBeenCalledTimes(1);
      expect(sleep.mock.calls[0]?.[0]).toBe(500);
      expect(now).toBe(500);
    });

    it('serves waiters in arrival order and refuses check while they queue', async () => {
      const store = createStore(1, 1);
      await store.acquire('analyze');
      const order: Array<string> = [];

      const first = store.acquire('analyze').then(() => order.push('first'));
      const second = store.acquire('analyze').then(() => order.push('second'));

      expect(await store.check('analyze')).toBe(false);
      await Promise.all([first, second]);

      expect(order).toEqual(['first', 'second']);
      expect(now).toBe(2000);
    });

    it('fails fast when the bucket can never hold a whole token', async () => {
      const store = createStore(1, 0.5);

      const attempt = store.acquire('analyze');

      await expect(attempt).rejects.toBeInstanceOf(RateLimitExceededError);
      await expect(attempt).rejects.toThrow(
        "Rate limit for resource 'analyze' can never grant a token",
      );
      expect(sleep).not.toHaveBeenCalled();
    });

    it('fails fast with RateLimitExceededError when the wait exceeds maxWaitMs', async () => {
      const store = createStore(1, 1);
      await store.acquire('analyze');

      const attempt = store.acquire('analyze', { maxWaitMs: 0 });

      await expect(attempt).rejects.toBeInstanceOf(RateLimitExceededError);
      await expect(attempt).rejects.toMatchObject({
        resource: 'analyze',
        retryAfterMs: 1000,
      });
      expect(sleep).not.toHaveBeenCalled();
    });

    it('consumes nothing when aborted while waiting', async () => {
      sleep.mockImplementation(
        (_ms, signal) =>
          new Promise<void>((_resolve, reject) => {
            signal?.addEventListener('abort', () => reject(signal.reason));
          }),
      );
      const store = createStore(1, 1);
      await store.acquire('analyze');
      const controller = new AbortController();

      const waiting = store.acquire('analyze', { signal: controller.signal });
      await vi.waitFor(() => expect(sleep).toHaveBeenCalled());
      controller.abort(new Error('cancelled'));

      await expect(waiting).rejects.toThrow('cancelled');

      now += 1000;
      expect((await store.getStatus('analyze')).remaining).toBe(1);
      expect(await store.check('analyze')).toBe(true);
    });
  });

  describe('status and configuration', () => {
    it('reports remaining tokens, limit and wait time', async () => {
      const store = createStore(2, 3);
      for (let i = 0; i < 3; i++) {
        await store.check('analyze');
      }

      const status = await store.getStatus('analyze');

      expect(status.remaining).toBe(0);
      expect(status.limit).toBe(3);
      expect(status.resetTime).toBeInstanceOf(Date);
      await expect(store.getWaitTime('analyze')).resolves.toBe(500);
    });

    it('reports zero wait for an untouched resource', async () => {
      await expect(createStore().getWaitTime('fresh')).resolves.toBe(0);
    });

    it('reset refills the bucket', async () => {
      const store = createStore(1, 2);
      await store.check('analyze');
      await store.check('analyze');

      await store.reset('analyze');

      expect((await store.getStatus('analyze')).remaining).toBe(2);
    });

    it('applies a new rate from the next refill without resetting tokens', async () => {
      const store = createStore(1, 2);
      await store.check('analyze');
      await store.check('analyze');

      store.setResourceConfig('analyze', { rate: 10, burst: 2 });
      expect(await store.check('analyze')).toBe(false);

      now += 100;
      expect(await store.check('analyze')).toBe(true);
      expect(store.getResourceConfig('analyze')).toEqual({ rate: 10, burst: 2 });
      expect(store.getResourceConfig('other')).toEqual({ rate: 1, burst: 2 });
    });

    it('uses per-resource configuration', async () => {
      const store = new InMemoryRateLimitStore({
        defaultConfig: { rate: 1, burst: 1 },
        resourceConfigs: new Map([['list', { rate: 1, burst: 5 }]]),
        registry,
        clock,
        sleep,
      });

      expect((await store.getStatus('list')).limit).toBe(5);
      expect((await store.getStatus('analyze')).limit).toBe(1);
    });
  });

  describe('registry', () => {
    it('shares buckets between stores on the same registry', async () => {
      const a = createStore(1, 1);
      const b = createStore(1, 1);

      expect(await a.check('analyze')).toBe(true);
      expect(await b.check('analyze')).toBe(false);
    });

    it('isolates stores on separate registries', async () => {
      const a = createStore(1, 1);
      const b = new InMemoryRateLimitStore({
        defaultConfig: { rate: 1, burst: 1 },
        registry: new TokenBucketRegistry(),
        clock,
      });

      expect(await a.check('analyze')).toBe(true);
      expect(await b.check('analyze')).toBe(true);
    });

    it('clear forgets every bucket', async () => {
      const store = createStore(1, 1);
      await store.check('analyze');

      registry.clear();

      expect(registry.keys()).toEqual([]);
      expect(await store.check('analyze')).toBe(true);
    });
  });
});
