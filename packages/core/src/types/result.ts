/**
 * Explicit success/failure value used across the request lifecycle so that
 * retry and classification logic can branch on data instead of exceptions.
 */
export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}
