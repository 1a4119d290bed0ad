import {
  KeyedMutex,
  WaitingAcquirers,
  type TokenBucketState,
} from '@sandbox-kit/core';

/**
 * Bucket state and per-key locks shared by every in-memory rate-limit store
 * that points at the same registry. The module-level default makes limits
 * process-wide; tests create their own or call `clear()`.
 */
export class TokenBucketRegistry {
  readonly mutex = new KeyedMutex();
  readonly waiting = new WaitingAcquirers();
  private readonly buckets = new Map<string, TokenBucketState>();

  get(key: string): TokenBucketState | undefined {
    return this.buckets.get(key);
  }

  set(key: string, state: TokenBucketState): void {
    this.buckets.set(key, state);
  }

  delete(key: string): void {
    this.buckets.delete(key);
  }

  clear(): void {
    this.buckets.clear();
  }

  keys(): Array<string> {
    return [...this.buckets.keys()];
  }
}

export const defaultTokenBucketRegistry = new TokenBucketRegistry();
