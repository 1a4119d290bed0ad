import {
  isRetryable,
  type ClassifiedError,
  type RetryExhausted,
} from '../errors/classified-error.js';
import { err, type Result } from '../types/result.js';
import { sleep as defaultSleep, throwIfAborted, type SleepFn } from '../utils/abort.js';

export type RetryStrategy = 'exponential' | 'linear';

export interface RetryPolicy {
  /** Total attempts including the first. */
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  strategy: RetryStrategy;
  backoffFactor: number;
  /** Multiply each computed delay by a uniform factor in [0.5, 1.5). */
  jitter: boolean;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 60_000,
  strategy: 'exponential',
  backoffFactor: 2,
  jitter: true,
};

export interface RetryAttempt {
  /** The attempt that just failed (1-based). */
  attempt: number;
  /** Delay before the next attempt. */
  delayMs: number;
  error: ClassifiedError;
}

export interface RetryHooks {
  signal?: AbortSignal;
  onRetry?: (attempt: RetryAttempt) => void;
  /** Source of randomness for jitter, in [0, 1). */
  random?: () => number;
  sleep?: SleepFn;
}

/**
 * Delay after a failed `attempt`. A server-provided `Retry-After` is used
 * as-is; otherwise the strategy curve is capped at `maxDelayMs` and then
 * jittered.
 */
export function computeRetryDelay(
  attempt: number,
  error: ClassifiedError,
  policy: RetryPolicy,
  random: () => number = Math.random,
): number {
  if (error.kind === 'rate-limit' && error.retryAfterMs !== undefined) {
    return error.retryAfterMs;
  }

  const base =
    policy.strategy === 'exponential'
      ? policy.initialDelayMs * policy.backoffFactor ** (attempt - 1)
      : policy.initialDelayMs * attempt;
  const capped = Math.min(policy.maxDelayMs, base);

  return policy.jitter ? capped * (0.5 + random()) : capped;
}

/**
 * Runs `operation` until it succeeds, fails with a non-retryable error, or
 * `maxAttempts` is reached. Aborting the signal during a backoff sleep
 * rejects with the abort reason.
 */
export async function retry<T>(
  operation: (attempt: number) => Promise<Result<T, ClassifiedError>>,
  policy: RetryPolicy,
  hooks: RetryHooks = {},
): Promise<Result<T, ClassifiedError | RetryExhausted>> {
  const { signal, onRetry, random = Math.random, sleep = defaultSleep } = hooks;
  const maxAttempts = Math.max(1, Math.floor(policy.maxAttempts));

  for (let attempt = 1; ; attempt++) {
    throwIfAborted(signal);

    const result = await operation(attempt);
    if (result.ok) {
      return result;
    }

    const error = result.error;
    if (!isRetryable(error)) {
      return result;
    }

    if (attempt >= maxAttempts) {
      return err({
        kind: 'retry-exhausted',
        message: `Failed after ${attempt} attempts. Last error: ${error.message}`,
        attempts: attempt,
        lastError: error,
      });
    }

    const delayMs = computeRetryDelay(attempt, error, policy, random);
    onRetry?.({ attempt, delayMs, error });
    await sleep(delayMs, signal);
  }
}
