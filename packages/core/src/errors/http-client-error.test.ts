import { describe, it, expect } from 'vitest';
import {
  AuthenticationError,
  HttpClientError,
  MalformedResponseError,
  NetworkError,
  NotFoundError,
  RateLimitError,
  RetryExhaustedError,
  ServerError,
  ValidationError,
  toHttpClientError,
} from './http-client-error.js';

describe('toHttpClientError', () => {
  it('keeps the prototype chain for instanceof checks', () => {
    const error = toHttpClientError({
      kind: 'authentication',
      message: 'Invalid API key',
      statusCode: 401,
    });

    expect(error).toBeInstanceOf(AuthenticationError);
    expect(error).toBeInstanceOf(HttpClientError);
    expect(error).toBeInstanceOf(Error);
    expect(error.kind).toBe('authentication');
    expect(error.statusCode).toBe(401);
    expect(error.name).toBe('AuthenticationError');
  });

  it('defaults the rate-limit wait to 60 seconds without a hint', () => {
    const error = toHttpClientError({
      kind: 'rate-limit',
      message: 'Rate limit exceeded',
      statusCode: 429,
    });

    expect(error).toBeInstanceOf(RateLimitError);
    if (!(error instanceof RateLimitError)) return;
    expect(error.retryAfterMs).toBe(60_000);
  });

  it('carries the server hint', () => {
    const error = toHttpClientError({
      kind: 'rate-limit',
      message: 'slow down',
      statusCode: 429,
      retryAfterMs: 1500,
    });

    if (!(error instanceof RateLimitError)) {
      throw new Error('expected RateLimitError');
    }
    expect(error.retryAfterMs).toBe(1500);
  });

  it.each([
    [{ kind: 'not-found' as const, message: 'gone', statusCode: 404 }, NotFoundError],
    [{ kind: 'server' as const, message: 'boom', statusCode: 503 }, ServerError],
    [
      { kind: 'validation' as const, message: 'bad', issues: [] },
      ValidationError,
    ],
    [
      { kind: 'malformed-response' as const, message: 'odd', body: '<html>' },
      MalformedResponseError,
    ],
    [{ kind: 'network' as const, message: 'reset' }, NetworkError],
  ])('maps %o to the matching class', (classified, ErrorClass) => {
    expect(toHttpClientError(classified)).toBeInstanceOf(ErrorClass);
  });

  it('maps generic failures to the base class with their status', () => {
    const error = toHttpClientError({
      kind: 'generic',
      message: 'Request failed with HTTP 400',
      statusCode: 400,
      data: { error: true },
    });

    expect(error.constructor).toBe(HttpClientError);
    expect(error.kind).toBe('generic');
    expect(error.statusCode).toBe(400);
    expect(error.data).toEqual({ error: true });
  });

  it('wraps the last error when retries are exhausted', () => {
    const error = toHttpClientError({
      kind: 'retry-exhausted',
      message: 'Failed after 3 attempts. Last error: boom',
      attempts: 3,
      lastError: { kind: 'server', message: 'boom', statusCode: 502 },
    });

    if (!(error instanceof RetryExhaustedError)) {
      throw new Error('expected RetryExhaustedError');
    }
    expect(error.attempts).toBe(3);
    expect(error.lastError).toBeInstanceOf(ServerError);
    expect(error.lastError.statusCode).toBe(502);
    expect(error.statusCode).toBe(502);
    expect(error.cause).toBe(error.lastError);
  });
});
