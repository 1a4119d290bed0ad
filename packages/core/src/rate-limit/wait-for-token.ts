import { RateLimitExceededError } from '../errors/http-client-error.js';
import type { AcquireOptions } from '../stores/rate-limit-store.js';
import { sleep as defaultSleep, throwIfAborted, type SleepFn } from '../utils/abort.js';
import type { WaitingAcquirers } from './waiting-acquirers.js';

export interface TakeAttempt {
  consumed: boolean;
  waitMs: number;
}

/**
 * Polls `take` until it consumes a token, sleeping for the wait it reports.
 * Shared by every store so that `maxWaitMs` and abort behave the same way
 * whatever the backend.
 *
 * From its first failed take until it returns, the caller is counted in
 * `waiting`. A bucket that can never hold a whole token fails at once.
 */
export async function waitForToken(
  resource: string,
  take: () => Promise<TakeAttempt> | TakeAttempt,
  options: AcquireOptions = {},
  sleep: SleepFn = defaultSleep,
  waiting?: WaitingAcquirers,
): Promise<void> {
  const { signal, maxWaitMs } = options;
  const startedAt = Date.now();
  let leave: (() => void) | undefined;

  try {
    for (;;) {
      throwIfAborted(signal);

      const attempt = await take();
      if (attempt.consumed) {
        return;
      }

      if (!Number.isFinite(attempt.waitMs)) {
        throw new RateLimitExceededError(resource, attempt.waitMs);
      }
      if (maxWaitMs !== undefined) {
        const waited = Date.now() - startedAt;
        if (waited + attempt.waitMs > maxWaitMs) {
          throw new RateLimitExceededError(resource, attempt.waitMs);
        }
      }

      leave ??= waiting?.enter(resource);
      // Floating-point refill can land a hair short of a whole token.
      await sleep(Math.max(1, Math.ceil(attempt.waitMs)), signal);
    }
  } finally {
    leave?.();
  }
}
