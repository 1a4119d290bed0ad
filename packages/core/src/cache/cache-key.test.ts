import { createHash } from 'node:crypto';
import { describe, it, expect } from 'vitest';
import { buildCacheKey, stableStringify } from './cache-key.js';

describe('stableStringify', () => {
  it('sorts object keys at every depth', () => {
    expect(stableStringify({ b: 1, a: { d: 2, c: [3, { f: 4, e: 5 }] } })).toBe(
      '{"a":{"c":[3,{"e":5,"f":4}],"d":2},"b":1}',
    );
  });

  it('drops undefined members and nulls undefined array slots', () => {
    expect(stableStringify({ a: undefined, b: [undefined, 1] })).toBe(
      '{"b":[null,1]}',
    );
  });

  it('renders dates as ISO strings', () => {
    expect(stableStringify({ at: new Date(0) })).toBe(
      '{"at":"1970-01-01T00:00:00.000Z"}',
    );
  });
});

describe('buildCacheKey', () => {
  it('prefixes the operation and hashes the arguments', () => {
    const digest = createHash('sha256').update('{"taskId":"abc"}').digest('hex');

    expect(buildCacheKey('getAnalysis', { taskId: 'abc' }, 'sandbox:')).toBe(
      `sandbox:getAnalysis:${digest}`,
    );
  });

  it('collides for the same arguments in a different key order', () => {
    expect(buildCacheKey('list', { skip: 0, limit: 25 })).toBe(
      buildCacheKey('list', { limit: 25, skip: 0 }),
    );
  });

  it('differs across operations and argument values', () => {
    const base = buildCacheKey('getAnalysis', { taskId: 'abc' });

    expect(buildCacheKey('getStatus', { taskId: 'abc' })).not.toBe(base);
    expect(buildCacheKey('getAnalysis', { taskId: 'abd' })).not.toBe(base);
  });
});
