export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export function createAbortError(message = 'The operation was aborted'): Error {
  const error = new Error(message);
  error.name = 'AbortError';
  return error;
}

/**
 * The reason an aborted signal carries, or a generic `AbortError` when the
 * signal was aborted without one.
 */
export function abortReason(signal: AbortSignal): unknown {
  return signal.reason ?? createAbortError();
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw abortReason(signal);
  }
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

/**
 * Timer-based sleep that rejects with the signal's reason when aborted.
 * Uses the global `setTimeout` so fake timers apply.
 */
export const sleep: SleepFn = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal ? abortReason(signal) : createAbortError());
    };

    const timer = setTimeout(
      () => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      },
      Math.max(0, ms),
    );

    signal?.addEventListener('abort', onAbort, { once: true });
  });
