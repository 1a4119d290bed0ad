import type { Headers } from 'undici';
import type {
  ClassifiedError,
  ClassifiedErrorKind,
  RetryExhausted,
  ValidationIssue,
} from './classified-error.js';

export type HttpClientErrorKind =
  | ClassifiedErrorKind
  | 'retry-exhausted'
  | 'rate-limit-exceeded'
  | 'client-closed'
  | 'timeout';

export interface HttpClientErrorOptions {
  /** Parsed response body, if available. */
  data?: unknown;
  /** Response headers, if available. */
  headers?: Headers;
  cause?: unknown;
}

/**
 * Base error class for every failure surfaced by the client.
 * `kind` mirrors the classification that produced it.
 */
export class HttpClientError extends Error {
  public readonly kind: HttpClientErrorKind;
  public readonly statusCode?: number;
  /** Parsed response body from the failed request. */
  public readonly data?: unknown;
  /** Response headers from the failed request. */
  public readonly headers?: Headers;

  constructor(
    kind: HttpClientErrorKind,
    message: string,
    statusCode?: number,
    options?: HttpClientErrorOptions,
  ) {
    super(
      message,
      options?.cause === undefined ? undefined : { cause: options.cause },
    );
    this.name = 'HttpClientError';
    this.kind = kind;
    this.statusCode = statusCode;
    this.data = options?.data;
    this.headers = options?.headers;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class AuthenticationError extends HttpClientError {
  constructor(
    message = 'Invalid API key',
    statusCode = 401,
    options?: HttpClientErrorOptions,
  ) {
    super('authentication', message, statusCode, options);
    this.name = 'AuthenticationError';
  }
}

export class NotFoundError extends HttpClientError {
  constructor(
    message = 'Resource not found',
    statusCode = 404,
    options?: HttpClientErrorOptions,
  ) {
    super('not-found', message, statusCode, options);
    this.name = 'NotFoundError';
  }
}

export const DEFAULT_RETRY_AFTER_MS = 60_000;

export class RateLimitError extends HttpClientError {
  /** How long the server asked us to wait; 60s when it gave no hint. */
  public readonly retryAfterMs: number;

  constructor(
    message = 'Rate limit exceeded',
    retryAfterMs: number = DEFAULT_RETRY_AFTER_MS,
    statusCode = 429,
    options?: HttpClientErrorOptions,
  ) {
    super('rate-limit', message, statusCode, options);
    this.name = 'RateLimitError';
    this.retryAfterMs = retryAfterMs;
  }
}

export class ServerError extends HttpClientError {
  constructor(
    message = 'Server error',
    statusCode = 500,
    options?: HttpClientErrorOptions,
  ) {
    super('server', message, statusCode, options);
    this.name = 'ServerError';
  }
}

export class ValidationError extends HttpClientError {
  public readonly issues: ReadonlyArray<ValidationIssue>;

  constructor(
    message: string,
    issues: ReadonlyArray<ValidationIssue> = [],
    statusCode?: number,
    options?: HttpClientErrorOptions,
  ) {
    super('validation', message, statusCode, options);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

export class MalformedResponseError extends HttpClientError {
  /** Raw response text (truncated) that failed to parse. */
  public readonly body: string;

  constructor(
    message: string,
    body: string,
    statusCode?: number,
    options?: HttpClientErrorOptions,
  ) {
    super('malformed-response', message, statusCode, options);
    this.name = 'MalformedResponseError';
    this.body = body;
  }
}

export class NetworkError extends HttpClientError {
  constructor(message: string, options?: HttpClientErrorOptions) {
    super('network', message, undefined, options);
    this.name = 'NetworkError';
  }
}

export class RetryExhaustedError extends HttpClientError {
  public readonly attempts: number;
  public readonly lastError: HttpClientError;

  constructor(message: string, attempts: number, lastError: HttpClientError) {
    super('retry-exhausted', message, lastError.statusCode, {
      data: lastError.data,
      headers: lastError.headers,
      cause: lastError,
    });
    this.name = 'RetryExhaustedError';
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

/**
 * Raised by a rate-limit store when the caller's `maxWaitMs` is shorter than
 * the wait needed for a token.
 */
export class RateLimitExceededError extends HttpClientError {
  public readonly resource: string;
  public readonly retryAfterMs: number;

  constructor(resource: string, retryAfterMs: number) {
    super(
      'rate-limit-exceeded',
      Number.isFinite(retryAfterMs)
        ? `Rate limit exceeded for resource '${resource}'. Retry in ${Math.ceil(retryAfterMs)}ms`
        : `Rate limit for resource '${resource}' can never grant a token`,
    );
    this.name = 'RateLimitExceededError';
    this.resource = resource;
    this.retryAfterMs = retryAfterMs;
  }
}

export class ClientClosedError extends HttpClientError {
  constructor(message = 'Client has been closed') {
    super('client-closed', message);
    this.name = 'ClientClosedError';
  }
}

export class TimeoutError extends HttpClientError {
  constructor(message: string) {
    super('timeout', message);
    this.name = 'TimeoutError';
  }
}

/**
 * Converts a classification result into the matching error class.
 */
export function toHttpClientError(
  error: ClassifiedError | RetryExhausted,
): HttpClientError {
  const options: HttpClientErrorOptions = {};
  if (error.kind !== 'retry-exhausted') {
    options.data = error.data;
    options.headers = error.headers;
  }

  switch (error.kind) {
    case 'authentication':
      return new AuthenticationError(error.message, error.statusCode, options);
    case 'not-found':
      return new NotFoundError(error.message, error.statusCode, options);
    case 'rate-limit':
      return new RateLimitError(
        error.message,
        error.retryAfterMs ?? DEFAULT_RETRY_AFTER_MS,
        error.statusCode,
        options,
      );
    case 'server':
      return new ServerError(error.message, error.statusCode, options);
    case 'validation':
      return new ValidationError(
        error.message,
        error.issues,
        error.statusCode,
        options,
      );
    case 'malformed-response':
      return new MalformedResponseError(
        error.message,
        error.body,
        error.statusCode,
        options,
      );
    case 'network':
      return new NetworkError(error.message, { ...options, cause: error.cause });
    case 'generic':
      return new HttpClientError(
        'generic',
        error.message,
        error.statusCode,
        options,
      );
    case 'retry-exhausted':
      return new RetryExhaustedError(
        error.message,
        error.attempts,
        toHttpClientError(error.lastError),
      );
  }
}
