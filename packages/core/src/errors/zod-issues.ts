import type { ZodError } from 'zod';
import type { ValidationIssue } from './classified-error.js';
import { ValidationError } from './http-client-error.js';

export function issuesFromZod(error: ZodError): Array<ValidationIssue> {
  return error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

/**
 * Wraps a zod failure in a {@link ValidationError} whose message lists every
 * issue as `path: message`.
 */
export function validationErrorFromZod(
  error: ZodError,
  context: string,
): ValidationError {
  const issues = issuesFromZod(error);
  const summary = issues
    .map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message))
    .join('; ');
  return new ValidationError(`${context}: ${summary}`, issues);
}
