import { DynamoDBDocumentClient, GetCommand, PutCommand } from '@aws-sdk/lib-dynamodb';
import {
  ValidationError,
  type AcquireOptions,
  type FetchFn,
  type SleepFn,
  type RateLimitConfig,
  type RateLimitStatus,
  type RateLimitStore,
} from '@sandbox-kit/core';
import { mockClient } from 'aws-sdk-client-mock';
import { pino } from 'pino';
import { Response } from 'undici';
import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import { createSandboxClient } from './create-sandbox-client.js';

const logger = pino({ level: 'silent' });

function jsonResponse(body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { 'content-type': 'application/json' },
  });
}

function environmentResponse(): Response {
  return jsonResponse({ error: false, data: { os: ['windows'] } });
}

class RecordingRateLimitStore implements RateLimitStore {
  readonly acquired: Array<string> = [];

  async check(): Promise<boolean> {
    return true;
  }

  async acquire(resource: string, _options?: AcquireOptions): Promise<void> {
    this.acquired.push(resource);
  }

  async reset(): Promise<void> {}

  async getStatus(): Promise<RateLimitStatus> {
    return { remaining: 1, limit: 1, resetTime: new Date(0) };
  }

  async getWaitTime(): Promise<number> {
    return 0;
  }

  setResourceConfig(_resource: string, _config: RateLimitConfig): void {}

  getResourceConfig(): RateLimitConfig {
    return { rate: 1, burst: 1 };
  }
}

describe('createSandboxClient', () => {
  let fetchMock: Mock<FetchFn>;

  beforeEach(() => {
    fetchMock = vi.fn<FetchFn>(async () => environmentResponse());
  });

  it('rejects an invalid configuration', () => {
    expect(() => createSandboxClient({ apiKey: '' })).toThrow(ValidationError);
    expect(() => createSandboxClient({ apiKey: '' })).toThrow(
      'Invalid client configuration: apiKey: API key is required',
    );
  });

  it('sends requests to the configured service with credentials', async () => {
    const client = createSandboxClient(
      { apiKey: 'test-secret', cacheEnabled: false },
      { fetch: fetchMock, logger },
    );

    await client.getEnvironment();
    await client.close();

    expect(fetchMock.mock.calls[0]?.[0]).toBe('https://api.any.run/v1/environment');
    expect(fetchMock.mock.calls[0]?.[1]?.headers).toMatchObject({
      Authorization: 'API-Key test-secret',
      'User-Agent': 'sandbox-kit',
    });
  });

  it('serves repeated cacheable reads from the memory cache', async () => {
    const client = createSandboxClient(
      { apiKey: 'test-secret' },
      { fetch: fetchMock, logger },
    );

    const first = await client.getEnvironment();
    const second = await client.getEnvironment();
    await client.close();

    expect(second).toEqual(first);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('does not cache when caching is disabled', async () => {
    const client = createSandboxClient(
      { apiKey: 'test-secret', cacheEnabled: false },
      { fetch: fetchMock, logger },
    );

    await client.getEnvironment();
    await client.getEnvironment();
    await client.close();

    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('builds SQLite stores and closes them with the client', async () => {
    const client = createSandboxClient(
      {
        apiKey: 'test-secret',
        cacheBackend: 'sqlite',
        rateLimitBackend: 'sqlite',
        sqlitePath: ':memory:',
      },
      { fetch: fetchMock, logger },
    );

    await client.getEnvironment();
    await client.getEnvironment();
    await client.close();

    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('stores cached responses in DynamoDB', async () => {
    const ddbMock = mockClient(DynamoDBDocumentClient);
    ddbMock.on(GetCommand).resolves({}).on(PutCommand).resolves({});
    const client = createSandboxClient(
      {
        apiKey: 'test-secret',
        cacheBackend: 'dynamodb',
        rateLimitEnabled: false,
        dynamoDbRegion: 'us-east-1',
        dynamoDbTableName: 'sandbox-test',
      },
      { fetch: fetchMock, logger },
    );

    await client.getEnvironment();
    await client.close();

    const put = ddbMock.commandCalls(PutCommand)[0]?.args[0].input;
    expect(put?.TableName).toBe('sandbox-test');
    expect(put?.Item?.['value']).toBe('{"error":false,"data":{"os":["windows"]}}');
    ddbMock.restore();
  });

  it('draws tokens from an injected rate-limit store', async () => {
    const rateLimit = new RecordingRateLimitStore();
    const client = createSandboxClient(
      { apiKey: 'test-secret', cacheEnabled: false },
      { fetch: fetchMock, logger, rateLimit },
    );

    await client.getEnvironment();
    fetchMock.mockResolvedValueOnce(
      new Response(JSON.stringify({ error: false, data: { taskid: 't' } }), {
        status: 200,
      }),
    );
    await client.analyzeUrl('https://example.com');
    await client.close();

    expect(rateLimit.acquired).toEqual(['default', 'analyze']);
  });

  it('skips the limiter when rate limiting is disabled', async () => {
    const rateLimit = new RecordingRateLimitStore();
    const client = createSandboxClient(
      { apiKey: 'test-secret', cacheEnabled: false, rateLimitEnabled: false },
      { fetch: fetchMock, logger, rateLimit },
    );

    await client.getEnvironment();
    await client.close();

    expect(rateLimit.acquired).toEqual([]);
  });

  it('submits a file, waits for the verdict and reads the report from cache', async () => {
    const requests: Array<string> = [];
    let statusPolls = 0;
    const serviceFetch = vi.fn<FetchFn>(async (input, init) => {
      const url = String(input);
      const method = init?.method ?? 'GET';
      requests.push(`${method} ${url}`);

      if (method === 'POST') {
        return jsonResponse({ error: false, data: { taskid: 'task-42' } });
      }
      if (url.endsWith('/status')) {
        statusPolls += 1;
        return jsonResponse({
          error: false,
          data:
            statusPolls < 2
              ? {
                  task: { uuid: 'task-42', status: 60, remaining: 20 },
                  completed: false,
                }
              : { completed: true },
        });
      }
      return jsonResponse({
        error: false,
        data: { uuid: 'task-42', verdict: 'malicious' },
      });
    });
    let now = 0;
    const sleep = vi.fn<SleepFn>(async (ms) => {
      now += ms;
    });
    const rateLimit = new RecordingRateLimitStore();
    const client = createSandboxClient(
      { apiKey: 'test-secret', baseUrl: 'https://sandbox.test' },
      { fetch: serviceFetch, logger, rateLimit, sleep, clock: () => now },
    );

    const { taskId } = await client.analyzeFile(new Uint8Array([77, 90]));
    const status = await client.waitForCompletion(taskId, {
      pollIntervalMs: 1_000,
    });
    const report = await client.getAnalysis(taskId);
    const again = await client.getAnalysis(taskId);
    await client.close();

    expect(taskId).toBe('task-42');
    expect(status).toEqual({ completed: true, error: false });
    expect(report).toEqual({ uuid: 'task-42', verdict: 'malicious' });
    expect(again).toEqual(report);
    expect(requests).toEqual([
      'POST https://sandbox.test/v1/analysis',
      'GET https://sandbox.test/v1/analysis/task-42/status',
      'GET https://sandbox.test/v1/analysis/task-42/status',
      'GET https://sandbox.test/v1/analysis/task-42',
    ]);
    // The cached second read draws no token.
    expect(rateLimit.acquired).toEqual(['analyze', 'status', 'status', 'status']);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1_000]);
  });
});
