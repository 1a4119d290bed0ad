import { createHash } from 'node:crypto';

/**
 * JSON with object keys sorted at every depth, so logically identical
 * arguments serialize identically. `undefined` members are dropped the way
 * `JSON.stringify` drops them.
 */
export function stableStringify(value: unknown): string {
  return JSON.stringify(normalize(value)) ?? 'null';
}

function normalize(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => (item === undefined ? null : normalize(item)));
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (typeof value === 'object' && value !== null) {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      const member: unknown = Reflect.get(value, key);
      if (member !== undefined) {
        sorted[key] = normalize(member);
      }
    }
    return sorted;
  }
  return value;
}

/**
 * `prefix + operation + ':' + sha256(stable JSON of args)`.
 */
export function buildCacheKey(
  operation: string,
  args: unknown,
  prefix = '',
): string {
  const digest = createHash('sha256')
    .update(stableStringify(args))
    .digest('hex');
  return `${prefix}${operation}:${digest}`;
}
