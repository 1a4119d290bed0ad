export { buildCacheKey, stableStringify } from './cache-key.js';
export { NoopCacheStore } from './noop-cache-store.js';
export {
  ResponseCache,
  DEFAULT_CACHE_PREFIX,
  DEFAULT_CACHE_TTL_SECONDS,
} from './response-cache.js';
export type { ResponseCacheOptions } from './response-cache.js';
