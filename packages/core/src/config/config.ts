import { z } from 'zod';
import { validationErrorFromZod } from '../errors/zod-issues.js';
import { LOG_LEVEL_NAMES } from '../logging/logger.js';
import type { RetryPolicy } from '../retry/retry.js';
import type { RateLimitConfig } from '../stores/rate-limit-config.js';

export const DEFAULT_BASE_URL = 'https://api.any.run';
export const DEFAULT_USER_AGENT = 'sandbox-kit';

const storeBackendSchema = z.enum(['memory', 'sqlite', 'dynamodb']);
export type StoreBackend = z.infer<typeof storeBackendSchema>;

/**
 * Client configuration. Durations are in seconds, matching the service's
 * own documentation; conversion to milliseconds happens in the helpers below.
 */
export const sandboxClientConfigSchema = z
  .object({
    apiKey: z.string().min(1, 'API key is required'),
    baseUrl: z
      .string()
      .url()
      .default(DEFAULT_BASE_URL)
      .transform((url) => url.replace(/\/+$/, '')),
    apiVersion: z
      .string()
      .regex(/^v\d+$/, 'API version must look like v1')
      .default('v1'),
    timeout: z.number().positive().default(30),
    verifyTls: z.boolean().default(true),
    proxy: z.string().url().optional(),
    userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
    headers: z.record(z.string()).default({}),

    cacheEnabled: z.boolean().default(true),
    cacheBackend: storeBackendSchema.default('memory'),
    cacheTtl: z.number().int().nonnegative().default(300),
    cachePrefix: z.string().default('sandbox:'),

    rateLimitEnabled: z.boolean().default(true),
    rateLimitBackend: storeBackendSchema.default('memory'),
    /** Requests per second. */
    rateLimit: z.number().nonnegative().default(10),
    /** Seconds of traffic the bucket may absorb in one burst. */
    rateLimitWindow: z.number().positive().default(1),

    retryEnabled: z.boolean().default(true),
    retryStrategy: z.enum(['exponential', 'linear']).default('exponential'),
    retryMaxAttempts: z.number().int().min(1).default(3),
    retryInitialDelay: z.number().nonnegative().default(1),
    retryMaxDelay: z.number().nonnegative().default(60),
    retryBackoffFactor: z.number().min(1).default(2),
    retryJitter: z.boolean().default(true),

    logLevel: z.enum(LOG_LEVEL_NAMES).optional(),

    /** Database file for the `sqlite` backends. */
    sqlitePath: z.string().min(1).default('sandbox-kit.db'),
    dynamoDbTableName: z.string().min(1).optional(),
    dynamoDbRegion: z.string().min(1).optional(),
  })
  .refine((config) => config.retryMaxDelay >= config.retryInitialDelay, {
    message: 'retryMaxDelay must be greater than or equal to retryInitialDelay',
    path: ['retryMaxDelay'],
  })
  // A bucket smaller than one token could never grant a request.
  .refine(
    (config) =>
      config.rateLimit === 0 || config.rateLimit * config.rateLimitWindow >= 1,
    {
      message:
        'rateLimit × rateLimitWindow must be at least 1 (or rateLimit 0 for no limit)',
      path: ['rateLimitWindow'],
    },
  );

export type SandboxClientConfigInput = z.input<typeof sandboxClientConfigSchema>;
export type SandboxClientConfig = Readonly<
  z.output<typeof sandboxClientConfigSchema>
>;

/**
 * Validates, applies defaults and freezes. Throws `ValidationError`.
 */
export function resolveConfig(input: SandboxClientConfigInput): SandboxClientConfig {
  const parsed = sandboxClientConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw validationErrorFromZod(parsed.error, 'Invalid client configuration');
  }
  return Object.freeze({
    ...parsed.data,
    headers: Object.freeze({ ...parsed.data.headers }),
  });
}

function readNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  return Number(value);
}

function readBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined) {
    return undefined;
  }
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

/**
 * Reads the `SANDBOX_*` environment variables and `LOG_LEVEL`. Unset variables are left out
 * so that schema defaults apply.
 */
export function configFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): Partial<SandboxClientConfigInput> {
  const config: Partial<SandboxClientConfigInput> = {};

  const apiKey = env['SANDBOX_API_KEY'];
  if (apiKey !== undefined) config.apiKey = apiKey;
  const baseUrl = env['SANDBOX_BASE_URL'];
  if (baseUrl !== undefined) config.baseUrl = baseUrl;
  const proxy = env['SANDBOX_PROXY'];
  if (proxy !== undefined) config.proxy = proxy;
  const timeout = readNumber(env['SANDBOX_TIMEOUT']);
  if (timeout !== undefined) config.timeout = timeout;
  const cacheEnabled = readBoolean(env['SANDBOX_CACHE_ENABLED']);
  if (cacheEnabled !== undefined) config.cacheEnabled = cacheEnabled;
  const rateLimit = readNumber(env['SANDBOX_RATE_LIMIT']);
  if (rateLimit !== undefined) config.rateLimit = rateLimit;
  const retryMaxAttempts = readNumber(env['SANDBOX_RETRY_MAX_ATTEMPTS']);
  if (retryMaxAttempts !== undefined) config.retryMaxAttempts = retryMaxAttempts;

  const logLevel = env['LOG_LEVEL']?.toLowerCase();
  const level = LOG_LEVEL_NAMES.find((name) => name === logLevel);
  if (level) config.logLevel = level;

  return config;
}

export function toRetryPolicy(config: SandboxClientConfig): RetryPolicy {
  return {
    maxAttempts: config.retryMaxAttempts,
    initialDelayMs: config.retryInitialDelay * 1000,
    maxDelayMs: config.retryMaxDelay * 1000,
    strategy: config.retryStrategy,
    backoffFactor: config.retryBackoffFactor,
    jitter: config.retryJitter,
  };
}

/**
 * `rateLimit` tokens per second, with a bucket holding one window's worth.
 */
export function toRateLimitConfig(config: SandboxClientConfig): RateLimitConfig {
  return {
    rate: config.rateLimit,
    burst: config.rateLimit * config.rateLimitWindow,
  };
}
