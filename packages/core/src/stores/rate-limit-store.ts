import type { RateLimitConfig } from './rate-limit-config.js';

export interface RateLimitStatus {
  remaining: number;
  limit: number;
  /** When the bucket will be full again. */
  resetTime: Date;
}

export interface AcquireOptions {
  /**
   * Cancels the wait. An aborted acquire consumes no token and rejects with
   * the signal's reason.
   */
  signal?: AbortSignal;
  /**
   * Upper bound on how long to wait for a token. When the required wait is
   * longer, `acquire` rejects with `RateLimitExceededError` instead of
   * sleeping. `0` fails immediately when no token is available.
   */
  maxWaitMs?: number;
}

/**
 * Token-bucket rate limiter keyed by resource name.
 */
export interface RateLimitStore {
  /**
   * Consumes a token if one is available right now. Never waits; returns
   * `false` while other callers are queued on the same resource.
   */
  check(resource: string): Promise<boolean>;

  /**
   * Waits until a token is available, then consumes it. Waiters on one
   * resource are served in arrival order.
   */
  acquire(resource: string, options?: AcquireOptions): Promise<void>;

  /** Refills the bucket to capacity. */
  reset(resource: string): Promise<void>;

  getStatus(resource: string): Promise<RateLimitStatus>;

  /** Milliseconds until one token will be available (0 if now). */
  getWaitTime(resource: string): Promise<number>;

  /**
   * Changes a resource's parameters. Existing tokens are kept and the new
   * rate applies from the next refill.
   */
  setResourceConfig(resource: string, config: RateLimitConfig): void;

  getResourceConfig(resource: string): RateLimitConfig;
}
