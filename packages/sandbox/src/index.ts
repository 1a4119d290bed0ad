export { SandboxClient, RATE_LIMIT_KEYS } from './sandbox-client.js';
export type {
  CallOptions,
  Closeable,
  FileAnalysisOptions,
  SandboxClientOptions,
  SubmissionOptions,
  UserInfoRequest,
  WaitForCompletionOptions,
} from './sandbox-client.js';
export { createSandboxClient } from './create-sandbox-client.js';
export type { SandboxClientOverrides } from './create-sandbox-client.js';

export * from './models/index.js';

// Re-exported so most callers need only this package
export {
  AuthenticationError,
  HttpClientError,
  NotFoundError,
  RateLimitError,
  RetryExhaustedError,
  ServerError,
  TimeoutError,
  ValidationError,
  configFromEnv,
} from '@sandbox-kit/core';
export type { SandboxClientConfigInput } from '@sandbox-kit/core';
