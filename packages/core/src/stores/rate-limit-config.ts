/**
 * Token-bucket parameters for one resource key.
 *
 * Shared by every store implementation (in-memory, SQLite, DynamoDB) so that
 * callers can use a single canonical type.
 */
export interface RateLimitConfig {
  /** Tokens added per second. `<= 0` disables limiting. */
  rate: number;
  /** Bucket capacity. `<= 0` disables limiting. */
  burst: number;
}

/**
 * Default bucket: 10 requests per second with a burst of 10.
 *
 * Store implementations can reference this to avoid duplicating magic numbers.
 */
export const DEFAULT_RATE_LIMIT: RateLimitConfig = {
  rate: 10,
  burst: 10,
};

/**
 * Map of resource keys to their rate-limit configurations.
 */
export type RateLimitConfigMap = Map<string, RateLimitConfig>;
