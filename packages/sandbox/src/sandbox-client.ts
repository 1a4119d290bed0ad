import { readFile } from 'node:fs/promises';
import path from 'node:path';
import {
  TimeoutError,
  createLogger,
  sleep as defaultSleep,
  validationErrorFromZod,
  type HttpClientContract,
  type Logger,
  type ResponseEnvelope,
  type SleepFn,
} from '@sandbox-kit/core';
import { z, type ZodType, type ZodTypeDef } from 'zod';
import {
  DEFAULT_FILENAME,
  analysisRequestSchema,
  listAnalysesSchema,
  toRequestBody,
  type AnalysisOptions,
  type AnalysisRequest,
  type ListAnalysesRequest,
} from './models/analysis.js';
import {
  analysisCreatedSchema,
  dataEnvelopeSchema,
  messageEnvelopeSchema,
  monitorEventSchema,
  taskStatusEnvelopeSchema,
  taskStatusUpdateSchema,
  isTerminalStatus,
  userPresetsSchema,
  type AnalysisCreated,
  type MessageResponse,
  type MonitorEvent,
  type ResponseData,
  type TaskStatusUpdate,
  type UserPreset,
} from './models/responses.js';

/** Token buckets the endpoints draw from. */
export const RATE_LIMIT_KEYS = {
  analyze: 'analyze',
  status: 'status',
  list: 'list',
  default: 'default',
} as const;

export interface CallOptions {
  signal?: AbortSignal;
}

export interface FileAnalysisOptions extends AnalysisOptions, CallOptions {
  /** Upload name. Defaults to the path's base name, or `malware.exe` for bytes. */
  filename?: string;
}

export interface SubmissionOptions extends AnalysisOptions, CallOptions {}

export interface UserInfoRequest extends CallOptions {
  team?: boolean;
}

export interface WaitForCompletionOptions extends CallOptions {
  /** Defaults to 5 s. */
  pollIntervalMs?: number;
  /** Defaults to 10 minutes. */
  timeoutMs?: number;
}

export interface Closeable {
  close(): Promise<void>;
}

export interface SandboxClientOptions {
  logger?: Logger;
  sleep?: SleepFn;
  clock?: () => number;
  /** Closed after the transport, in order. */
  resources?: Array<Closeable>;
}

const taskIdSchema = z.string().trim().min(1, 'Task id is required');

const waitOptionsSchema = z.object({
  pollIntervalMs: z.number().positive().default(5_000),
  timeoutMs: z.number().positive().default(600_000),
});

const userInfoSchema = z.object({ team: z.boolean().default(false) });

function parseInput<Output>(
  schema: ZodType<Output, ZodTypeDef, unknown>,
  input: unknown,
  context: string,
): Output {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw validationErrorFromZod(parsed.error, context);
  }
  return parsed.data;
}

function withoutSignal<T extends CallOptions>(
  options: T,
): Omit<T, 'signal'> {
  const { signal: _signal, ...rest } = options;
  return rest;
}

/**
 * Endpoint methods for the sandbox API. Every call is validated before it
 * is sent and runs through the transport's cache, rate limiter and retry
 * policy.
 *
 * @example
 * ```typescript
 * const client = createSandboxClient({ apiKey: process.env.SANDBOX_API_KEY });
 * const { taskId } = await client.analyzeUrl('https://example.com');
 * const status = await client.waitForCompletion(taskId);
 * await client.close();
 * ```
 */
export class SandboxClient {
  private readonly logger: Logger;
  private readonly sleep: SleepFn;
  private readonly clock: () => number;
  private readonly resources: Array<Closeable>;
  private closing: Promise<void> | undefined;

  constructor(
    private readonly http: HttpClientContract,
    options: SandboxClientOptions = {},
  ) {
    this.logger = options.logger ?? createLogger('SandboxClient');
    this.sleep = options.sleep ?? defaultSleep;
    this.clock = options.clock ?? Date.now;
    this.resources = options.resources ?? [];
  }

  async analyze(
    request: AnalysisRequest,
    { signal }: CallOptions = {},
  ): Promise<AnalysisCreated> {
    const parsed = parseInput(
      analysisRequestSchema,
      request,
      'Invalid analysis request',
    );
    this.logger.debug({ objType: parsed.objType }, 'Submitting analysis');

    return this.http.execute({
      operation: 'analyze',
      method: 'POST',
      path: '/analysis',
      body: toRequestBody(parsed),
      rateLimitKey: RATE_LIMIT_KEYS.analyze,
      signal,
      parse: (envelope) => analysisCreatedSchema.parse(envelope),
    });
  }

  /**
   * Submits a file given as a path or as its contents.
   */
  async analyzeFile(
    file: string | Uint8Array,
    options: FileAnalysisOptions = {},
  ): Promise<AnalysisCreated> {
    const { filename, ...rest } = withoutSignal(options);
    const content = typeof file === 'string' ? await readFile(file) : file;
    const name =
      filename ?? (typeof file === 'string' ? path.basename(file) : DEFAULT_FILENAME);

    return this.analyze(
      { ...rest, objType: 'file', file: content, filename: name },
      { signal: options.signal },
    );
  }

  async analyzeUrl(
    url: string,
    options: SubmissionOptions = {},
  ): Promise<AnalysisCreated> {
    return this.analyze(
      { ...withoutSignal(options), objType: 'url', url },
      { signal: options.signal },
    );
  }

  /** The sandbox downloads `url` and runs what it receives. */
  async analyzeDownload(
    url: string,
    options: SubmissionOptions = {},
  ): Promise<AnalysisCreated> {
    return this.analyze(
      { ...withoutSignal(options), objType: 'download', url },
      { signal: options.signal },
    );
  }

  async rerunAnalysis(
    taskRerunUuid: string,
    options: SubmissionOptions = {},
  ): Promise<AnalysisCreated> {
    return this.analyze(
      { ...withoutSignal(options), objType: 'rerun', taskRerunUuid },
      { signal: options.signal },
    );
  }

  async getAnalysis(
    taskId: string,
    { signal }: CallOptions = {},
  ): Promise<ResponseData> {
    const id = this.taskId(taskId);
    return this.http.execute({
      operation: 'getAnalysis',
      method: 'GET',
      path: `/analysis/${id}`,
      cacheable: true,
      rateLimitKey: RATE_LIMIT_KEYS.status,
      signal,
      parse: (envelope) => dataEnvelopeSchema.parse(envelope),
    });
  }

  async getAnalysisStatus(
    taskId: string,
    { signal }: CallOptions = {},
  ): Promise<TaskStatusUpdate> {
    const id = this.taskId(taskId);
    return this.http.execute({
      operation: 'getAnalysisStatus',
      method: 'GET',
      path: `/analysis/${id}/status`,
      rateLimitKey: RATE_LIMIT_KEYS.status,
      signal,
      parse: (envelope) => taskStatusEnvelopeSchema.parse(envelope),
    });
  }

  async getAnalysisMonitor(
    taskId: string,
    { signal }: CallOptions = {},
  ): Promise<ResponseData> {
    const id = this.taskId(taskId);
    return this.http.execute({
      operation: 'getAnalysisMonitor',
      method: 'GET',
      path: `/analysis/${id}/monitor`,
      rateLimitKey: RATE_LIMIT_KEYS.status,
      signal,
      parse: (envelope) => dataEnvelopeSchema.parse(envelope),
    });
  }

  async listAnalyses(
    request: ListAnalysesRequest & CallOptions = {},
  ): Promise<ResponseData> {
    const query = parseInput(
      listAnalysesSchema,
      withoutSignal(request),
      'Invalid list request',
    );
    return this.http.execute({
      operation: 'listAnalyses',
      method: 'GET',
      path: '/analysis',
      query,
      cacheable: true,
      rateLimitKey: RATE_LIMIT_KEYS.list,
      signal: request.signal,
      parse: (envelope) => dataEnvelopeSchema.parse(envelope),
    });
  }

  /** Extends a running task's time budget. */
  async addAnalysisTime(
    taskId: string,
    { signal }: CallOptions = {},
  ): Promise<MessageResponse> {
    const id = this.taskId(taskId);
    return this.taskAction('addAnalysisTime', 'POST', `/${id}/time`, signal, (envelope) =>
      messageEnvelopeSchema.parse(envelope),
    );
  }

  async stopAnalysis(
    taskId: string,
    { signal }: CallOptions = {},
  ): Promise<ResponseData> {
    const id = this.taskId(taskId);
    return this.taskAction('stopAnalysis', 'POST', `/${id}/stop`, signal, (envelope) =>
      dataEnvelopeSchema.parse(envelope),
    );
  }

  async deleteAnalysis(
    taskId: string,
    { signal }: CallOptions = {},
  ): Promise<ResponseData> {
    const id = this.taskId(taskId);
    return this.taskAction('deleteAnalysis', 'DELETE', `/${id}`, signal, (envelope) =>
      dataEnvelopeSchema.parse(envelope),
    );
  }

  async getEnvironment({ signal }: CallOptions = {}): Promise<ResponseData> {
    return this.http.execute({
      operation: 'getEnvironment',
      method: 'GET',
      path: '/environment',
      cacheable: true,
      rateLimitKey: RATE_LIMIT_KEYS.default,
      signal,
      parse: (envelope) => dataEnvelopeSchema.parse(envelope),
    });
  }

  async getUserInfo(request: UserInfoRequest = {}): Promise<ResponseData> {
    const query = parseInput(
      userInfoSchema,
      withoutSignal(request),
      'Invalid user info request',
    );
    return this.http.execute({
      operation: 'getUserInfo',
      method: 'GET',
      path: '/user',
      query,
      cacheable: true,
      rateLimitKey: RATE_LIMIT_KEYS.default,
      signal: request.signal,
      parse: (envelope) => dataEnvelopeSchema.parse(envelope),
    });
  }

  async getUserPresets({ signal }: CallOptions = {}): Promise<Array<UserPreset>> {
    return this.http.execute({
      operation: 'getUserPresets',
      method: 'GET',
      path: '/user/presets',
      cacheable: true,
      rateLimitKey: RATE_LIMIT_KEYS.default,
      signal,
      parse: (envelope) => userPresetsSchema.parse(envelope),
    });
  }

  /**
   * Live status updates. Ends after the event reporting completion or
   * failure.
   */
  streamStatus(
    taskId: string,
    { signal }: CallOptions = {},
  ): AsyncGenerator<TaskStatusUpdate, void, undefined> {
    const id = this.taskId(taskId);
    return this.http.stream({
      operation: 'streamStatus',
      path: `/analysis/status/${id}/stream`,
      rateLimitKey: RATE_LIMIT_KEYS.status,
      signal,
      parse: (payload) => taskStatusUpdateSchema.parse(payload),
      isFinal: isTerminalStatus,
    });
  }

  /**
   * Live process and network activity. Ends when the server closes the feed
   * or an event carries `completed: true` or `error: true`.
   */
  streamMonitor(
    taskId: string,
    { signal }: CallOptions = {},
  ): AsyncGenerator<MonitorEvent, void, undefined> {
    const id = this.taskId(taskId);
    return this.http.stream({
      operation: 'streamMonitor',
      path: `/analysis/monitor/${id}/stream`,
      rateLimitKey: RATE_LIMIT_KEYS.status,
      signal,
      parse: (payload) => monitorEventSchema.parse(payload),
      isFinal: (event) => event['completed'] === true || event['error'] === true,
    });
  }

  /**
   * Polls the status endpoint until the task completes or fails, and returns
   * that last status; check `error` to tell the two apart.
   *
   * @throws {TimeoutError} when `timeoutMs` passes first.
   */
  async waitForCompletion(
    taskId: string,
    options: WaitForCompletionOptions = {},
  ): Promise<TaskStatusUpdate> {
    const id = this.taskId(taskId);
    const { pollIntervalMs, timeoutMs } = parseInput(
      waitOptionsSchema,
      withoutSignal(options),
      'Invalid wait options',
    );
    const deadline = this.clock() + timeoutMs;

    for (;;) {
      const status = await this.getAnalysisStatus(id, { signal: options.signal });
      if (isTerminalStatus(status)) {
        return status;
      }

      const remainingMs = deadline - this.clock();
      if (remainingMs <= 0) {
        throw new TimeoutError(
          `Analysis ${id} did not complete within ${timeoutMs}ms`,
        );
      }
      this.logger.debug(
        { taskId: id, progress: status.task?.status, remaining: status.task?.remaining },
        'Analysis still running',
      );
      await this.sleep(Math.min(pollIntervalMs, remainingMs), options.signal);
    }
  }

  /**
   * Idempotent. Closes the transport, then every resource the client was
   * given, even if an earlier one fails.
   */
  close(): Promise<void> {
    this.closing ??= this.shutdown();
    return this.closing;
  }

  private async shutdown(): Promise<void> {
    const failures: Array<unknown> = [];
    for (const resource of [this.http, ...this.resources]) {
      try {
        await resource.close();
      } catch (error) {
        failures.push(error);
      }
    }
    if (failures.length > 0) {
      throw failures[0];
    }
  }

  private taskAction<T>(
    operation: string,
    method: 'POST' | 'DELETE',
    suffix: string,
    signal: AbortSignal | undefined,
    parse: (envelope: ResponseEnvelope) => T,
  ): Promise<T> {
    return this.http.execute({
      operation,
      method,
      path: `/analysis${suffix}`,
      rateLimitKey: RATE_LIMIT_KEYS.analyze,
      signal,
      parse,
    });
  }

  private taskId(taskId: string): string {
    return encodeURIComponent(
      parseInput(taskIdSchema, taskId, 'Invalid task id'),
    );
  }
}
