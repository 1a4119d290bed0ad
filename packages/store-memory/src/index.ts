export { InMemoryCacheStore } from './in-memory-cache-store.js';
export { InMemoryRateLimitStore } from './in-memory-rate-limit-store.js';
export {
  TokenBucketRegistry,
  defaultTokenBucketRegistry,
} from './token-bucket-registry.js';
export type {
  InMemoryCacheStoreOptions,
  InMemoryCacheStats,
} from './in-memory-cache-store.js';
export type { InMemoryRateLimitStoreOptions } from './in-memory-rate-limit-store.js';
export type { RateLimitConfig } from '@sandbox-kit/core';
export type { CacheStore, RateLimitStore } from '@sandbox-kit/core';
