import type { Logger } from 'pino';
import {
  Agent,
  ProxyAgent,
  fetch as undiciFetch,
  type Dispatcher,
} from 'undici';
import { ZodError } from 'zod';
import { ResponseCache, type ResponseCacheOptions } from '../cache/response-cache.js';
import { DEFAULT_BASE_URL } from '../config/config.js';
import {
  classifyResponse,
  classifyTransportError,
  type ResponseEnvelope,
} from '../errors/classify.js';
import type { ClassifiedError, RetryExhausted } from '../errors/classified-error.js';
import {
  ClientClosedError,
  NetworkError,
  RateLimitExceededError,
  toHttpClientError,
} from '../errors/http-client-error.js';
import { issuesFromZod } from '../errors/zod-issues.js';
import { createLogger } from '../logging/logger.js';
import { retry, type RetryAttempt, type RetryPolicy } from '../retry/retry.js';
import { decodeSseData } from '../sse/sse-decoder.js';
import type { CacheStore } from '../stores/cache-store.js';
import type { RateLimitStore } from '../stores/rate-limit-store.js';
import type {
  HttpClientContract,
  QueryValue,
  RequestBody,
  RequestDescriptor,
  StreamDescriptor,
} from '../types/http-client.js';
import { err, ok, type Result } from '../types/result.js';
import {
  abortReason,
  sleep as defaultSleep,
  throwIfAborted,
  type SleepFn,
} from '../utils/abort.js';

export type FetchFn = typeof undiciFetch;

export interface HttpClientStores {
  cache?: CacheStore;
  rateLimit?: RateLimitStore;
}

export interface HttpClientOptions {
  /** Used as the logger's service name. */
  name?: string;
  baseUrl?: string;
  apiVersion?: string;
  /** Sent as `Authorization: API-Key <key>`. */
  apiKey?: string;
  userAgent?: string;
  /** Extra headers sent with every request. */
  headers?: Record<string, string>;
  /** Per transport call, not per logical request. Defaults to 30s. */
  timeoutMs?: number;
  verifyTls?: boolean;
  /** Proxy URL every request is tunnelled through. */
  proxy?: string;
  cache?: Omit<ResponseCacheOptions, 'logger'>;
  /** Defaults to true when a rate-limit store is supplied. */
  rateLimitEnabled?: boolean;
  /** `false` performs a single attempt and surfaces its raw error. */
  retry?: RetryPolicy | false;
  fetch?: FetchFn;
  /**
   * Connection pool to use. When omitted one is created on first use and
   * closed by {@link HttpClient.close}.
   */
  dispatcher?: Dispatcher;
  logger?: Logger;
  sleep?: SleepFn;
  random?: () => number;
}

interface Success<T> {
  envelope: ResponseEnvelope;
  value: T;
}

interface TimeoutHandle {
  signal: AbortSignal;
  clear: () => void;
}

const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_RATE_LIMIT_KEY = 'default';

function isEnvelope(value: unknown): value is ResponseEnvelope {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    'error' in value &&
    typeof value.error === 'boolean'
  );
}

function describeParseError(error: unknown): string {
  if (error instanceof ZodError) {
    return issuesFromZod(error)
      .map((issue) => `${issue.path || '(root)'}: ${issue.message}`)
      .join('; ');
  }
  return error instanceof Error ? error.message : String(error);
}

function encodeBody(body: RequestBody | undefined) {
  if (!body) {
    return undefined;
  }
  return body.type === 'json' ? JSON.stringify(body.value) : body.value;
}

function createTimeoutError(timeoutMs: number): Error {
  const error = new Error(`Request timed out after ${timeoutMs}ms`);
  error.name = 'TimeoutError';
  return error;
}

export class HttpClient implements HttpClientContract {
  readonly name: string;
  readonly cache: ResponseCache;

  private readonly baseUrl: string;
  private readonly apiVersion: string;
  private readonly defaultHeaders: Record<string, string>;
  private readonly timeoutMs: number;
  private readonly verifyTls: boolean;
  private readonly proxy: string | undefined;
  private readonly rateLimitEnabled: boolean;
  private readonly retryPolicy: RetryPolicy | undefined;
  private readonly fetchFn: FetchFn;
  private readonly logger: Logger;
  private readonly sleep: SleepFn;
  private readonly random: () => number;

  private dispatcher: Dispatcher | undefined;
  private isDispatcherManaged = false;
  private readonly inFlight = new Set<Promise<unknown>>();
  private readonly streams = new Set<AbortController>();
  private closed = false;
  private closing: Promise<void> | undefined;

  constructor(
    readonly stores: HttpClientStores = {},
    options: HttpClientOptions = {},
  ) {
    this.name = options.name ?? 'HttpClient';
    this.logger = options.logger ?? createLogger(this.name);
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.apiVersion = options.apiVersion ?? 'v1';
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.verifyTls = options.verifyTls ?? true;
    this.proxy = options.proxy;
    this.rateLimitEnabled =
      (options.rateLimitEnabled ?? true) && stores.rateLimit !== undefined;
    this.retryPolicy = options.retry === false ? undefined : options.retry;
    this.fetchFn = options.fetch ?? undiciFetch;
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
    this.dispatcher = options.dispatcher;

    this.defaultHeaders = {
      Accept: 'application/json',
      ...(options.userAgent ? { 'User-Agent': options.userAgent } : {}),
      ...options.headers,
      ...(options.apiKey ? { Authorization: `API-Key ${options.apiKey}` } : {}),
    };

    this.cache = new ResponseCache(stores.cache, {
      ...options.cache,
      logger: this.logger,
    });
  }

  /**
   * Cache lookup happens before rate limiting, so a hit never spends a
   * token. Each transport attempt inside the retry loop takes one token.
   */
  async execute<T>(descriptor: RequestDescriptor<T>): Promise<T> {
    this.assertOpen();
    return this.track(this.run(descriptor));
  }

  async *stream<T>(
    descriptor: StreamDescriptor<T>,
  ): AsyncGenerator<T, void, undefined> {
    this.assertOpen();

    const controller = new AbortController();
    this.streams.add(controller);
    const signal = descriptor.signal
      ? AbortSignal.any([descriptor.signal, controller.signal])
      : controller.signal;
    const maxReconnects = this.retryPolicy?.maxAttempts ?? 1;
    let failures = 0;

    try {
      for (;;) {
        const body = await this.openStream(descriptor, signal);
        try {
          for await (const line of decodeSseData(body)) {
            if (line.type === 'invalid') {
              this.logger.warn(
                { operation: descriptor.operation, line: line.line, err: line.error },
                'Skipping unparseable stream line',
              );
              continue;
            }

            let event: T;
            try {
              event = descriptor.parse(line.value);
            } catch (error) {
              this.logger.warn(
                {
                  operation: descriptor.operation,
                  reason: describeParseError(error),
                },
                'Skipping unexpected stream event',
              );
              continue;
            }

            failures = 0;
            yield event;
            if (descriptor.isFinal?.(event)) {
              return;
            }
          }
          return;
        } catch (error) {
          if (signal.aborted) {
            throw abortReason(signal);
          }
          failures += 1;
          if (failures >= maxReconnects) {
            throw new NetworkError(
              `Stream for ${descriptor.operation} failed after ${failures} connection(s)`,
              { cause: error },
            );
          }
          this.logger.warn(
            { operation: descriptor.operation, failures, err: error },
            'Stream interrupted; reconnecting',
          );
        }
      }
    } finally {
      controller.abort();
      this.streams.delete(controller);
    }
  }

  /**
   * Idempotent. Open streams are aborted, in-flight requests are allowed to
   * settle, then a client-created connection pool is closed.
   */
  close(): Promise<void> {
    this.closing ??= this.shutdown();
    return this.closing;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  private async shutdown(): Promise<void> {
    this.closed = true;
    for (const controller of this.streams) {
      controller.abort(new ClientClosedError('Client closed while streaming'));
    }
    await Promise.allSettled(this.inFlight);

    if (this.dispatcher && this.isDispatcherManaged) {
      await this.dispatcher.close();
      this.dispatcher = undefined;
    }
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new ClientClosedError();
    }
  }

  private track<T>(promise: Promise<T>): Promise<T> {
    this.inFlight.add(promise);
    const remove = (): void => {
      this.inFlight.delete(promise);
    };
    void promise.then(remove, remove);
    return promise;
  }

  private async run<T>(descriptor: RequestDescriptor<T>): Promise<T> {
    const { signal, operation } = descriptor;
    throwIfAborted(signal);

    const cacheKey =
      descriptor.cacheable === true &&
      descriptor.method === 'GET' &&
      this.cache.enabled
        ? this.cache.buildKey(
            operation,
            descriptor.cacheArgs ?? {
              path: descriptor.path,
              query: descriptor.query ?? {},
            },
          )
        : undefined;

    if (cacheKey) {
      const cached = await this.cache.get(cacheKey);
      if (isEnvelope(cached)) {
        try {
          const value = descriptor.parse(cached);
          this.logger.debug({ operation, cacheKey }, 'Cache hit');
          return value;
        } catch (error) {
          this.logger.warn(
            { operation, cacheKey, reason: describeParseError(error) },
            'Discarding unreadable cache entry',
          );
          await this.cache.delete(cacheKey);
        }
      } else {
        this.logger.debug({ operation, cacheKey }, 'Cache miss');
      }
    }

    const attempt = (n: number) => this.attempt(descriptor, n);
    let result: Result<Success<T>, ClassifiedError | RetryExhausted>;
    if (this.retryPolicy) {
      result = await retry(attempt, this.retryPolicy, {
        signal,
        random: this.random,
        sleep: this.sleep,
        onRetry: (info) => this.logRetry(operation, info),
      });
    } else {
      result = await attempt(1);
    }

    if (!result.ok) {
      throw toHttpClientError(result.error);
    }

    if (cacheKey && !signal?.aborted) {
      await this.cache.set(
        cacheKey,
        result.value.envelope,
        descriptor.cacheTtlSeconds,
      );
    }
    return result.value.value;
  }

  private async attempt<T>(
    descriptor: RequestDescriptor<T>,
    attempt: number,
  ): Promise<Result<Success<T>, ClassifiedError>> {
    await this.acquireToken(
      descriptor.rateLimitKey ?? DEFAULT_RATE_LIMIT_KEY,
      descriptor.signal,
    );

    this.logger.debug(
      { operation: descriptor.operation, method: descriptor.method, attempt },
      'Sending request',
    );
    const response = await this.send(descriptor);
    if (!response.ok) {
      return response;
    }

    try {
      return ok({
        envelope: response.value,
        value: descriptor.parse(response.value),
      });
    } catch (error) {
      return err({
        kind: 'malformed-response',
        message: `Unexpected response for ${descriptor.operation}: ${describeParseError(error)}`,
        body: JSON.stringify(response.value).slice(0, 500),
        data: response.value,
      });
    }
  }

  private async acquireToken(
    resource: string,
    signal: AbortSignal | undefined,
  ): Promise<void> {
    const limiter = this.stores.rateLimit;
    if (!this.rateLimitEnabled || !limiter) {
      return;
    }

    const startedAt = Date.now();
    try {
      await limiter.acquire(resource, { signal });
    } catch (error) {
      if (signal?.aborted || error instanceof RateLimitExceededError) {
        throw error;
      }
      this.logger.warn(
        { resource, err: error },
        'Rate limiter unavailable; proceeding without limiting',
      );
      return;
    }

    const waitedMs = Date.now() - startedAt;
    if (waitedMs > 0) {
      this.logger.debug({ resource, waitedMs }, 'Waited for rate-limit token');
    }
  }

  private async send(
    descriptor: RequestDescriptor<unknown>,
  ): Promise<Result<ResponseEnvelope, ClassifiedError>> {
    const timeout = this.startTimeout(descriptor.signal);
    try {
      const headers: Record<string, string> = {
        ...this.defaultHeaders,
        ...descriptor.headers,
      };
      if (descriptor.body?.type === 'json') {
        headers['Content-Type'] = 'application/json';
      }

      const response = await this.fetchFn(
        this.buildUrl(descriptor.path, descriptor.query),
        {
          method: descriptor.method,
          headers,
          body: encodeBody(descriptor.body),
          signal: timeout.signal,
          dispatcher: this.getDispatcher(),
        },
      );
      const text = await response.text();
      return classifyResponse(response.status, response.headers, text);
    } catch (error) {
      if (descriptor.signal?.aborted) {
        throw abortReason(descriptor.signal);
      }
      return err(classifyTransportError(error));
    } finally {
      timeout.clear();
    }
  }

  private async openStream<T>(
    descriptor: StreamDescriptor<T>,
    signal: AbortSignal,
  ): Promise<AsyncIterable<Uint8Array>> {
    const connect = async (): Promise<
      Result<AsyncIterable<Uint8Array>, ClassifiedError>
    > => {
      await this.acquireToken(
        descriptor.rateLimitKey ?? DEFAULT_RATE_LIMIT_KEY,
        signal,
      );

      // The timeout covers connecting only; the body may stay open for long.
      const timeout = this.startTimeout(signal);
      try {
        const response = await this.fetchFn(
          this.buildUrl(descriptor.path, descriptor.query),
          {
            method: 'GET',
            headers: {
              ...this.defaultHeaders,
              ...descriptor.headers,
              Accept: 'text/event-stream',
            },
            signal: timeout.signal,
            dispatcher: this.getDispatcher(),
          },
        );

        if (response.ok && response.body) {
          return ok(response.body);
        }

        const classified = classifyResponse(
          response.status,
          response.headers,
          await response.text(),
        );
        return err(
          classified.ok
            ? {
                kind: 'malformed-response',
                message: `Stream for ${descriptor.operation} returned no body`,
                body: '',
                statusCode: response.status,
              }
            : classified.error,
        );
      } catch (error) {
        if (signal.aborted) {
          throw abortReason(signal);
        }
        return err(classifyTransportError(error));
      } finally {
        timeout.clear();
      }
    };

    const result: Result<
      AsyncIterable<Uint8Array>,
      ClassifiedError | RetryExhausted
    > = this.retryPolicy
      ? await retry(connect, this.retryPolicy, {
          signal,
          random: this.random,
          sleep: this.sleep,
          onRetry: (info) => this.logRetry(descriptor.operation, info),
        })
      : await connect();

    if (!result.ok) {
      throw toHttpClientError(result.error);
    }
    return result.value;
  }

  private logRetry(operation: string, info: RetryAttempt): void {
    this.logger.debug(
      {
        operation,
        attempt: info.attempt,
        delayMs: Math.round(info.delayMs),
        kind: info.error.kind,
        statusCode: info.error.statusCode,
      },
      `Retrying after ${info.error.kind} error`,
    );
  }

  private startTimeout(signal: AbortSignal | undefined): TimeoutHandle {
    const controller = new AbortController();
    const timer = setTimeout(
      () => controller.abort(createTimeoutError(this.timeoutMs)),
      this.timeoutMs,
    );
    return {
      signal: signal
        ? AbortSignal.any([signal, controller.signal])
        : controller.signal,
      clear: () => clearTimeout(timer),
    };
  }

  private buildUrl(
    path: string,
    query: Record<string, QueryValue> | undefined,
  ): string {
    const url = new URL(`${this.baseUrl}/${this.apiVersion}${path}`);
    for (const [key, value] of Object.entries(query ?? {})) {
      if (value !== undefined) {
        url.searchParams.set(key, String(value));
      }
    }
    return url.toString();
  }

  private getDispatcher(): Dispatcher {
    if (!this.dispatcher) {
      const tls = { rejectUnauthorized: this.verifyTls };
      this.dispatcher = this.proxy
        ? new ProxyAgent({ uri: this.proxy, requestTls: tls })
        : new Agent({ connect: tls });
      this.isDispatcherManaged = true;
    }
    return this.dispatcher;
  }
}
