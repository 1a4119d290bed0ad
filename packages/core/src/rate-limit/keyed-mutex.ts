import { abortReason } from '../utils/abort.js';

interface LockEntry {
  tail: Promise<void>;
  pending: number;
}

/**
 * One async lock per key. Callers on the same key run strictly in arrival
 * order; different keys never block each other.
 */
export class KeyedMutex {
  private readonly locks = new Map<string, LockEntry>();

  async runExclusive<T>(
    key: string,
    fn: () => Promise<T> | T,
    signal?: AbortSignal,
  ): Promise<T> {
    if (signal?.aborted) {
      throw abortReason(signal);
    }

    const entry = this.locks.get(key) ?? { tail: Promise.resolve(), pending: 0 };
    const previous = entry.tail;

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    entry.tail = previous.then(() => current);
    entry.pending += 1;
    this.locks.set(key, entry);

    const done = (): void => {
      release();
      entry.pending -= 1;
      if (entry.pending === 0 && this.locks.get(key) === entry) {
        this.locks.delete(key);
      }
    };

    try {
      await waitForTurn(previous, signal);
    } catch (error) {
      done();
      throw error;
    }

    try {
      return await fn();
    } finally {
      done();
    }
  }
}

function waitForTurn(turn: Promise<void>, signal?: AbortSignal): Promise<void> {
  if (!signal) {
    return turn;
  }
  return new Promise<void>((resolve, reject) => {
    const onAbort = (): void => reject(abortReason(signal));
    signal.addEventListener('abort', onAbort, { once: true });
    turn.then(
      () => {
        signal.removeEventListener('abort', onAbort);
        resolve();
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}
