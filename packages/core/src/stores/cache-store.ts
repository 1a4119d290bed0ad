/**
 * Key-value cache with per-entry TTL.
 *
 * TTL semantics are shared by every backend: `undefined` or `0` never
 * expires, a negative value is expired immediately. Expired entries read as
 * absent and are removed on access.
 */
export interface CacheStore<T = unknown> {
  get(key: string): Promise<T | undefined>;
  set(key: string, value: T, ttlSeconds?: number): Promise<void>;
  delete(key: string): Promise<void>;
  exists(key: string): Promise<boolean>;
  clear(): Promise<void>;
}

/**
 * Absolute expiry for a TTL in seconds. `0` means no expiry.
 */
export function expiresAtFor(
  ttlSeconds: number | undefined,
  now: number,
): number {
  if (ttlSeconds === undefined || ttlSeconds === 0) {
    return 0;
  }
  if (ttlSeconds < 0) {
    return now;
  }
  return now + ttlSeconds * 1000;
}

export function isExpired(expiresAt: number, now: number): boolean {
  return expiresAt > 0 && now >= expiresAt;
}
