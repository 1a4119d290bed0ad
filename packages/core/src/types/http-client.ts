import type { FormData } from 'undici';
import type { ResponseEnvelope } from '../errors/classify.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type RequestBody =
  | { type: 'json'; value: unknown }
  | { type: 'form'; value: FormData };

export type QueryValue = string | number | boolean | undefined;

interface DescriptorBase {
  /** Logical operation name; also the cache-key namespace. */
  operation: string;
  /** Path below the versioned API root, e.g. `/analysis/abc`. */
  path: string;
  query?: Record<string, QueryValue>;
  headers?: Record<string, string>;
  /** Token bucket to draw from. Defaults to `default`. */
  rateLimitKey?: string;
  /**
   * AbortSignal that allows the caller to cancel the request, including any
   * internal rate-limit wait or backoff sleep. The promise rejects with the
   * signal's reason.
   */
  signal?: AbortSignal;
}

export interface RequestDescriptor<T> extends DescriptorBase {
  method: HttpMethod;
  body?: RequestBody;
  /** Serve from and store into the response cache. Honoured for GET only. */
  cacheable?: boolean;
  /** Overrides the cache's default TTL for this call. */
  cacheTtlSeconds?: number;
  /** Values identifying the request for the cache key. Defaults to path and query. */
  cacheArgs?: unknown;
  /**
   * Turns the decoded envelope into the caller's type. A throw is reported
   * as a malformed response.
   */
  parse: (envelope: ResponseEnvelope) => T;
}

export interface StreamDescriptor<T> extends DescriptorBase {
  /** Turns one `data:` payload into an event. A throw skips the line. */
  parse: (payload: unknown) => T;
  /** Ends the stream once an event satisfies it. */
  isFinal?: (event: T) => boolean;
}

export interface HttpClientContract {
  /**
   * Runs one request through cache, rate limiter, retry and classification.
   */
  execute<T>(descriptor: RequestDescriptor<T>): Promise<T>;

  /**
   * Opens a server-sent-events feed. Never cached.
   */
  stream<T>(descriptor: StreamDescriptor<T>): AsyncGenerator<T, void, undefined>;

  /** Rejects new calls, waits for in-flight ones, then releases connections. */
  close(): Promise<void>;
}
