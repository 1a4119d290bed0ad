import type { Headers } from 'undici';

export interface ValidationIssue {
  /** Dotted path of the offending field, empty for object-level issues. */
  path: string;
  message: string;
}

interface ClassifiedErrorBase {
  message: string;
  statusCode?: number;
  /** Parsed response body, when there was one. */
  data?: unknown;
  headers?: Headers;
}

/**
 * Structured description of a failed call. Produced by response
 * classification and consumed by the retry engine.
 */
export type ClassifiedError =
  | (ClassifiedErrorBase & { kind: 'authentication' })
  | (ClassifiedErrorBase & { kind: 'not-found' })
  | (ClassifiedErrorBase & {
      kind: 'rate-limit';
      /** Server-supplied wait from `Retry-After`, when the header was present. */
      retryAfterMs?: number;
    })
  | (ClassifiedErrorBase & { kind: 'server' })
  | (ClassifiedErrorBase & {
      kind: 'validation';
      issues: Array<ValidationIssue>;
    })
  | (ClassifiedErrorBase & { kind: 'malformed-response'; body: string })
  | (ClassifiedErrorBase & { kind: 'network'; cause?: unknown })
  | (ClassifiedErrorBase & { kind: 'generic' });

export type ClassifiedErrorKind = ClassifiedError['kind'];

export interface RetryExhausted {
  kind: 'retry-exhausted';
  message: string;
  attempts: number;
  lastError: ClassifiedError;
}

const RETRYABLE_KINDS: ReadonlySet<ClassifiedErrorKind> = new Set([
  'rate-limit',
  'server',
  'network',
  'generic',
]);

/**
 * Authentication, not-found, validation and malformed responses are
 * structural rejections; everything else may succeed on a later attempt.
 */
export function isRetryable(error: ClassifiedError): boolean {
  return RETRYABLE_KINDS.has(error.kind);
}
