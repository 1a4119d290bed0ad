export { HttpClient } from './http-client/http-client.js';
export type {
  FetchFn,
  HttpClientOptions,
  HttpClientStores,
} from './http-client/http-client.js';
export type {
  HttpClientContract,
  HttpMethod,
  QueryValue,
  RequestBody,
  RequestDescriptor,
  StreamDescriptor,
} from './types/http-client.js';
export { ok, err } from './types/result.js';
export type { Result } from './types/result.js';

export {
  HttpClientError,
  AuthenticationError,
  NotFoundError,
  RateLimitError,
  ServerError,
  ValidationError,
  MalformedResponseError,
  NetworkError,
  RetryExhaustedError,
  RateLimitExceededError,
  ClientClosedError,
  TimeoutError,
  DEFAULT_RETRY_AFTER_MS,
  toHttpClientError,
} from './errors/http-client-error.js';
export type {
  HttpClientErrorKind,
  HttpClientErrorOptions,
} from './errors/http-client-error.js';
export { isRetryable } from './errors/classified-error.js';
export type {
  ClassifiedError,
  ClassifiedErrorKind,
  RetryExhausted,
  ValidationIssue,
} from './errors/classified-error.js';
export {
  classifyResponse,
  classifyTransportError,
  parseRetryAfter,
} from './errors/classify.js';
export type { ResponseEnvelope } from './errors/classify.js';
export { issuesFromZod, validationErrorFromZod } from './errors/zod-issues.js';

export { retry, computeRetryDelay, DEFAULT_RETRY_POLICY } from './retry/retry.js';
export type {
  RetryAttempt,
  RetryHooks,
  RetryPolicy,
  RetryStrategy,
} from './retry/retry.js';

export * from './cache/index.js';

export type { CacheStore } from './stores/cache-store.js';
export { expiresAtFor, isExpired } from './stores/cache-store.js';
export type {
  AcquireOptions,
  RateLimitStatus,
  RateLimitStore,
} from './stores/rate-limit-store.js';
export { DEFAULT_RATE_LIMIT } from './stores/rate-limit-config.js';
export type {
  RateLimitConfig,
  RateLimitConfigMap,
} from './stores/rate-limit-config.js';

export {
  bucketStatus,
  createBucketState,
  isUnlimited,
  refillBucket,
  takeToken,
  waitTimeMs,
} from './rate-limit/token-bucket.js';
export type {
  BucketStatus,
  TakeTokenResult,
  TokenBucketState,
} from './rate-limit/token-bucket.js';
export { KeyedMutex } from './rate-limit/keyed-mutex.js';
export { WaitingAcquirers } from './rate-limit/waiting-acquirers.js';
export { waitForToken } from './rate-limit/wait-for-token.js';
export type { TakeAttempt } from './rate-limit/wait-for-token.js';

export {
  sandboxClientConfigSchema,
  resolveConfig,
  configFromEnv,
  toRetryPolicy,
  toRateLimitConfig,
  DEFAULT_BASE_URL,
  DEFAULT_USER_AGENT,
} from './config/config.js';
export type {
  SandboxClientConfig,
  SandboxClientConfigInput,
  StoreBackend,
} from './config/config.js';

export {
  baseLogger,
  createLogger,
  isLogLevel,
  LOG_LEVEL_NAMES,
} from './logging/logger.js';
export type { CreateLoggerOptions, Logger, LogLevel } from './logging/logger.js';

export { decodeSseData, readLines } from './sse/sse-decoder.js';
export type { SseLine } from './sse/sse-decoder.js';

export {
  abortReason,
  createAbortError,
  isAbortError,
  sleep,
  throwIfAborted,
} from './utils/abort.js';
export type { SleepFn } from './utils/abort.js';
