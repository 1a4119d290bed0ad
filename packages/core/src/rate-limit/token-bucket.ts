import type { RateLimitConfig } from '../stores/rate-limit-config.js';

export interface TokenBucketState {
  tokens: number;
  /** Clock reading (ms) of the last refill. */
  lastRefill: number;
}

export interface TakeTokenResult {
  state: TokenBucketState;
  consumed: boolean;
  /** Milliseconds until a token will be available; 0 when consumed. */
  waitMs: number;
}

export function isUnlimited(config: RateLimitConfig): boolean {
  return config.rate <= 0 || config.burst <= 0;
}

export function createBucketState(
  config: RateLimitConfig,
  now: number,
): TokenBucketState {
  return { tokens: Math.max(0, config.burst), lastRefill: now };
}

/**
 * Lazily adds `elapsed * rate` tokens, capped at `burst`. A clock that goes
 * backwards adds nothing.
 */
export function refillBucket(
  state: TokenBucketState,
  config: RateLimitConfig,
  now: number,
): TokenBucketState {
  const elapsedSeconds = Math.max(0, now - state.lastRefill) / 1000;
  const tokens = Math.min(
    config.burst,
    Math.max(0, state.tokens + elapsedSeconds * config.rate),
  );
  return { tokens, lastRefill: Math.max(now, state.lastRefill) };
}

/**
 * Milliseconds until the (already refilled) bucket holds one token. Infinite
 * when `burst` is below one, since the bucket can never fill that far.
 */
export function waitTimeMs(
  state: TokenBucketState,
  config: RateLimitConfig,
): number {
  if (isUnlimited(config) || state.tokens >= 1) {
    return 0;
  }
  if (config.burst < 1) {
    return Number.POSITIVE_INFINITY;
  }
  return ((1 - state.tokens) / config.rate) * 1000;
}

/**
 * Refills, then consumes one token if available.
 */
export function takeToken(
  state: TokenBucketState,
  config: RateLimitConfig,
  now: number,
): TakeTokenResult {
  if (isUnlimited(config)) {
    return { state, consumed: true, waitMs: 0 };
  }

  const refilled = refillBucket(state, config, now);
  if (refilled.tokens >= 1) {
    return {
      state: { ...refilled, tokens: refilled.tokens - 1 },
      consumed: true,
      waitMs: 0,
    };
  }

  return {
    state: refilled,
    consumed: false,
    waitMs: waitTimeMs(refilled, config),
  };
}

export interface BucketStatus {
  remaining: number;
  limit: number;
  /** Epoch time at which the bucket will be full again. */
  resetTime: Date;
}

/**
 * @param epochNow wall-clock time used to express `resetTime`, which may differ
 * from the monotonic clock driving the bucket.
 */
export function bucketStatus(
  state: TokenBucketState,
  config: RateLimitConfig,
  now: number,
  epochNow: number = Date.now(),
): BucketStatus {
  if (isUnlimited(config)) {
    return {
      remaining: Number.POSITIVE_INFINITY,
      limit: Number.POSITIVE_INFINITY,
      resetTime: new Date(epochNow),
    };
  }

  const refilled = refillBucket(state, config, now);
  const missing = config.burst - refilled.tokens;
  const untilFullMs = missing > 0 ? (missing / config.rate) * 1000 : 0;

  return {
    remaining: Math.floor(refilled.tokens),
    limit: config.burst,
    resetTime: new Date(epochNow + untilFullMs),
  };
}
