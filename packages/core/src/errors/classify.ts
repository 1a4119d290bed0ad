import type { Headers } from 'undici';
import type { ClassifiedError } from './classified-error.js';
import { err, ok, type Result } from '../types/result.js';

/** Canonical envelope every structured endpoint answers with. */
export interface ResponseEnvelope {
  error: boolean;
  message?: string;
  data?: unknown;
  [key: string]: unknown;
}

const MAX_BODY_EXCERPT = 500;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function excerpt(body: string): string {
  return body.length > MAX_BODY_EXCERPT
    ? `${body.slice(0, MAX_BODY_EXCERPT)}…`
    : body;
}

function parseJsonObject(
  bodyText: string,
): Record<string, unknown> | undefined {
  if (bodyText.trim() === '') {
    return undefined;
  }
  try {
    const parsed: unknown = JSON.parse(bodyText);
    // Some listings arrive as a bare array rather than an envelope.
    if (Array.isArray(parsed)) {
      return { data: parsed };
    }
    return isRecord(parsed) ? parsed : undefined;
  } catch {
    return undefined;
  }
}

function messageFrom(
  body: Record<string, unknown> | undefined,
  fallback: string,
): string {
  const message = body?.['message'];
  return typeof message === 'string' && message.length > 0 ? message : fallback;
}

/**
 * Parses a `Retry-After` header: a non-negative number of seconds
 * (fractions allowed) or an HTTP-date. Dates in the past yield 0.
 */
export function parseRetryAfter(
  value: string | null | undefined,
  now: number = Date.now(),
): number | undefined {
  if (value === null || value === undefined) {
    return undefined;
  }
  const trimmed = value.trim();
  if (trimmed === '') {
    return undefined;
  }

  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return Math.round(Number.parseFloat(trimmed) * 1000);
  }

  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) {
    return undefined;
  }
  return Math.max(0, date - now);
}

/**
 * Maps an HTTP response onto either the decoded envelope or a
 * {@link ClassifiedError}. Non-2xx statuses are classified by status code
 * regardless of what the body contains.
 */
export function classifyResponse(
  status: number,
  headers: Headers,
  bodyText: string,
): Result<ResponseEnvelope, ClassifiedError> {
  const body = parseJsonObject(bodyText);
  const base = { statusCode: status, data: body, headers };

  if (status >= 200 && status < 300) {
    if (!body) {
      return err({
        ...base,
        kind: 'malformed-response',
        message: `Expected a JSON object in the response body (HTTP ${status})`,
        body: excerpt(bodyText),
      });
    }
    if (body['error'] === true) {
      return err({
        ...base,
        kind: 'generic',
        message: messageFrom(body, 'Request failed'),
      });
    }
    return ok({ ...body, error: false });
  }

  switch (true) {
    case status === 401:
      return err({
        ...base,
        kind: 'authentication',
        message: messageFrom(body, 'Invalid API key'),
      });
    case status === 404:
      return err({
        ...base,
        kind: 'not-found',
        message: messageFrom(body, 'Resource not found'),
      });
    case status === 429:
      return err({
        ...base,
        kind: 'rate-limit',
        message: messageFrom(body, 'Rate limit exceeded'),
        retryAfterMs: parseRetryAfter(headers.get('retry-after')),
      });
    case status >= 500 && status < 600:
      return err({
        ...base,
        kind: 'server',
        message: messageFrom(body, `Server error: HTTP ${status}`),
      });
    default:
      return err({
        ...base,
        kind: 'generic',
        message: messageFrom(body, `Request failed with HTTP ${status}`),
      });
  }
}

/**
 * Transport-level failures (DNS, connection reset, per-call timeout).
 */
export function classifyTransportError(error: unknown): ClassifiedError {
  // AbortSignal.timeout rejects with a DOMException named TimeoutError.
  if (
    typeof error === 'object' &&
    error !== null &&
    'name' in error &&
    error.name === 'TimeoutError'
  ) {
    return {
      kind: 'network',
      message: 'Request timed out',
      cause: error,
    };
  }
  const detail =
    error instanceof Error
      ? error.cause instanceof Error
        ? `${error.message}: ${error.cause.message}`
        : error.message
      : String(error);
  return {
    kind: 'network',
    message: `Network error: ${detail}`,
    cause: error,
  };
}
