import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import {
  DeleteCommand,
  GetCommand,
  PutCommand,
  type DynamoDBDocumentClient,
} from '@aws-sdk/lib-dynamodb';
import {
  DEFAULT_RATE_LIMIT,
  KeyedMutex,
  WaitingAcquirers,
  bucketStatus,
  createBucketState,
  isUnlimited,
  refillBucket,
  sleep as defaultSleep,
  takeToken,
  waitForToken,
  waitTimeMs,
  type AcquireOptions,
  type RateLimitConfig,
  type RateLimitConfigMap,
  type RateLimitStatus,
  type RateLimitStore,
  type SleepFn,
  type TakeAttempt,
  type TokenBucketState,
} from '@sandbox-kit/core';
import {
  resolveDocumentClient,
  type DynamoDBClientOption,
} from './document-client.js';
import {
  assertDynamoKeyPart,
  isConditionalCheckFailure,
} from './dynamodb-utils.js';
import { throwIfDynamoTableMissing } from './table-missing-error.js';
import {
  DEFAULT_TABLE_NAME,
  TTL_ATTRIBUTE,
  ensureTable,
  type TableWaitOptions,
} from './table.js';

const BUCKET_SORT_KEY = 'BUCKET';
/** Pause suggested to the caller when every optimistic write lost a race. */
const CONTENTION_WAIT_MS = 25;

export interface DynamoDBRateLimitStoreOptions {
  client?: DynamoDBClientOption;
  /** Region for any client created here. */
  region?: string;
  tableName?: string;
  /** Create the table on first use when it is missing. */
  ensureTableExists?: boolean;
  tableWait?: TableWaitOptions;
  defaultConfig?: RateLimitConfig;
  resourceConfigs?: RateLimitConfigMap;
  /** Conditional-write attempts per take before reporting contention. */
  maxWriteAttempts?: number;
  clock?: () => number;
  sleep?: SleepFn;
}

interface StoredBucket {
  state: TokenBucketState;
  version: number;
}

function readBucket(
  item: Record<string, unknown> | undefined,
): StoredBucket | undefined {
  if (!item) {
    return undefined;
  }
  const { tokens, lastRefill, version } = item;
  if (
    typeof tokens !== 'number' ||
    typeof lastRefill !== 'number' ||
    typeof version !== 'number'
  ) {
    return undefined;
  }
  return { state: { tokens, lastRefill }, version };
}

/**
 * Token-bucket limiter shared through one DynamoDB item per resource.
 *
 * Takes are read-modify-write with a version condition; a lost race re-reads
 * and tries again. Nothing is written when no token is available.
 */
export class DynamoDBRateLimitStore implements RateLimitStore {
  private readonly docClient: DynamoDBDocumentClient;
  private readonly ownedClient: DynamoDBClient | undefined;
  private readonly tableName: string;
  private readonly readyPromise: Promise<void>;
  private readonly defaultConfig: RateLimitConfig;
  private readonly resourceConfigs: RateLimitConfigMap;
  private readonly maxWriteAttempts: number;
  private readonly clock: () => number;
  private readonly sleep: SleepFn;
  private readonly mutex = new KeyedMutex();
  private readonly waiting = new WaitingAcquirers();
  private isDestroyed = false;

  constructor({
    client,
    region,
    tableName = DEFAULT_TABLE_NAME,
    ensureTableExists = false,
    tableWait = {},
    defaultConfig = DEFAULT_RATE_LIMIT,
    resourceConfigs = new Map<string, RateLimitConfig>(),
    maxWriteAttempts = 5,
    clock = Date.now,
    sleep = defaultSleep,
  }: DynamoDBRateLimitStoreOptions = {}) {
    this.tableName = tableName;
    this.defaultConfig = defaultConfig;
    this.resourceConfigs = new Map(resourceConfigs);
    this.maxWriteAttempts = Math.max(1, maxWriteAttempts);
    this.clock = clock;
    this.sleep = sleep;

    const { docClient, tableClient, owned } = resolveDocumentClient(
      client,
      region,
    );
    this.docClient = docClient;
    this.ownedClient = owned;

    if (ensureTableExists) {
      this.readyPromise = this.prepareTable(tableClient, region, tableWait);
      // Surfaced to callers by the next awaited operation.
      this.readyPromise.catch(() => undefined);
    } else {
      this.readyPromise = Promise.resolve();
    }
  }

  async check(resource: string): Promise<boolean> {
    await this.ready(resource);
    if (isUnlimited(this.getResourceConfig(resource))) {
      return true;
    }
    if (this.waiting.has(resource)) {
      return false;
    }
    // Serialised per resource so local checks do not race each other's writes.
    return this.mutex.runExclusive(resource, async () => {
      const attempt = await this.take(resource);
      return attempt.consumed;
    });
  }

  async acquire(resource: string, options: AcquireOptions = {}): Promise<void> {
    await this.ready(resource);
    if (isUnlimited(this.getResourceConfig(resource))) {
      return;
    }
    const leave = this.waiting.has(resource)
      ? this.waiting.enter(resource)
      : undefined;
    try {
      await this.mutex.runExclusive(
        resource,
        () =>
          waitForToken(
            resource,
            () => this.take(resource),
            options,
            this.sleep,
            this.waiting,
          ),
        options.signal,
      );
    } finally {
      leave?.();
    }
  }

  async reset(resource: string): Promise<void> {
    await this.ready(resource);

    // A missing item reads as a full bucket.
    try {
      await this.docClient.send(
        new DeleteCommand({
          TableName: this.tableName,
          Key: { pk: this.partitionKey(resource), sk: BUCKET_SORT_KEY },
        }),
      );
    } catch (error: unknown) {
      throwIfDynamoTableMissing(error, this.tableName);
      throw error;
    }
  }

  async getStatus(resource: string): Promise<RateLimitStatus> {
    await this.ready(resource);
    const config = this.getResourceConfig(resource);
    const stored = await this.readStored(resource);
    const now = this.clock();
    const state = stored?.state ?? createBucketState(config, now);
    return bucketStatus(state, config, now, now);
  }

  async getWaitTime(resource: string): Promise<number> {
    await this.ready(resource);
    const config = this.getResourceConfig(resource);
    const stored = await this.readStored(resource);
    const now = this.clock();
    const state = stored?.state ?? createBucketState(config, now);
    return waitTimeMs(refillBucket(state, config, now), config);
  }

  setResourceConfig(resource: string, config: RateLimitConfig): void {
    this.resourceConfigs.set(resource, config);
  }

  getResourceConfig(resource: string): RateLimitConfig {
    return this.resourceConfigs.get(resource) ?? this.defaultConfig;
  }

  async close(): Promise<void> {
    this.destroy();
  }

  destroy(): void {
    if (!this.isDestroyed) {
      this.isDestroyed = true;
      this.ownedClient?.destroy();
    }
  }

  private async ready(resource: string): Promise<void> {
    if (this.isDestroyed) {
      throw new Error('Rate limit store has been destroyed');
    }
    assertDynamoKeyPart(resource, 'resource');
    await this.readyPromise;
  }

  private async take(resource: string): Promise<TakeAttempt> {
    for (let attempt = 0; attempt < this.maxWriteAttempts; attempt++) {
      if (this.isDestroyed) {
        throw new Error('Rate limit store has been destroyed');
      }

      const config = this.getResourceConfig(resource);
      const stored = await this.readStored(resource);
      const now = this.clock();
      const result = takeToken(
        stored?.state ?? createBucketState(config, now),
        config,
        now,
      );
      if (!result.consumed) {
        return result;
      }

      try {
        await this.writeBucket(resource, result.state, config, stored?.version);
        return result;
      } catch (error: unknown) {
        if (!isConditionalCheckFailure(error)) {
          throwIfDynamoTableMissing(error, this.tableName);
          throw error;
        }
      }
    }

    return { consumed: false, waitMs: CONTENTION_WAIT_MS };
  }

  private async readStored(resource: string): Promise<StoredBucket | undefined> {
    try {
      const result = await this.docClient.send(
        new GetCommand({
          TableName: this.tableName,
          Key: { pk: this.partitionKey(resource), sk: BUCKET_SORT_KEY },
          ConsistentRead: true,
        }),
      );
      return readBucket(result.Item);
    } catch (error: unknown) {
      throwIfDynamoTableMissing(error, this.tableName);
      throw error;
    }
  }

  private async writeBucket(
    resource: string,
    state: TokenBucketState,
    config: RateLimitConfig,
    expectedVersion: number | undefined,
  ): Promise<void> {
    // Once the bucket is full again the item carries no information.
    const untilFullMs = ((config.burst - state.tokens) / config.rate) * 1000;
    const ttl = Math.ceil((state.lastRefill + untilFullMs) / 1000) + 60;

    await this.docClient.send(
      new PutCommand({
        TableName: this.tableName,
        Item: {
          pk: this.partitionKey(resource),
          sk: BUCKET_SORT_KEY,
          tokens: state.tokens,
          lastRefill: state.lastRefill,
          version: (expectedVersion ?? 0) + 1,
          [TTL_ATTRIBUTE]: ttl,
        },
        ...(expectedVersion === undefined
          ? { ConditionExpression: 'attribute_not_exists(pk)' }
          : {
              ConditionExpression: 'version = :expected',
              ExpressionAttributeValues: { ':expected': expectedVersion },
            }),
      }),
    );
  }

  private partitionKey(resource: string): string {
    return `RATELIMIT#${resource}`;
  }

  private async prepareTable(
    tableClient: DynamoDBClient | undefined,
    region: string | undefined,
    wait: TableWaitOptions,
  ): Promise<void> {
    if (tableClient) {
      await ensureTable(tableClient, this.tableName, wait);
      return;
    }

    // A document client does not expose its control-plane client.
    const temporary = new DynamoDBClient(region ? { region } : {});
    try {
      await ensureTable(temporary, this.tableName, wait);
    } finally {
      temporary.destroy();
    }
  }
}
