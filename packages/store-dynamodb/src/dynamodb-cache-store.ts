import type { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import {
  GetCommand,
  PutCommand,
  DeleteCommand,
  type DynamoDBDocumentClient,
} from '@aws-sdk/lib-dynamodb';
import { expiresAtFor, isExpired, type CacheStore } from '@sandbox-kit/core';
import {
  resolveDocumentClient,
  type DynamoDBClientOption,
} from './document-client.js';
import { assertDynamoKeyPart, deleteKeys, scanKeys } from './dynamodb-utils.js';
import { throwIfDynamoTableMissing } from './table-missing-error.js';
import { DEFAULT_TABLE_NAME, TTL_ATTRIBUTE } from './table.js';

const UNDEFINED_SENTINEL = '__UNDEFINED__';

export interface DynamoDBCacheStoreOptions {
  client?: DynamoDBClientOption;
  /** Region for the client created when none is given. */
  region?: string;
  tableName?: string;
  /** Entries larger than this are not written. DynamoDB caps items at 400 KB. */
  maxEntrySizeBytes?: number;
  now?: () => number;
}

interface CachedEntry {
  value: string;
  expiresAt: number;
}

function readEntry(item: Record<string, unknown> | undefined): CachedEntry | undefined {
  if (!item) {
    return undefined;
  }
  const value = item['value'];
  const expiresAt = item['expiresAt'];
  if (typeof value !== 'string') {
    return undefined;
  }
  return { value, expiresAt: typeof expiresAt === 'number' ? expiresAt : 0 };
}

export class DynamoDBCacheStore<T = unknown> implements CacheStore<T> {
  private readonly docClient: DynamoDBDocumentClient;
  private readonly ownedClient: DynamoDBClient | undefined;
  private readonly tableName: string;
  private readonly maxEntrySizeBytes: number;
  private readonly now: () => number;
  private isDestroyed = false;

  constructor({
    client,
    region,
    tableName = DEFAULT_TABLE_NAME,
    maxEntrySizeBytes = 390 * 1024,
    now = Date.now,
  }: DynamoDBCacheStoreOptions = {}) {
    this.tableName = tableName;
    this.maxEntrySizeBytes = maxEntrySizeBytes;
    this.now = now;

    const resolved = resolveDocumentClient(client, region);
    this.docClient = resolved.docClient;
    this.ownedClient = resolved.owned;
  }

  async get(key: string): Promise<T | undefined> {
    const entry = await this.readLive(key);
    if (!entry || entry.value === UNDEFINED_SENTINEL) {
      return undefined;
    }

    try {
      return JSON.parse(entry.value);
    } catch {
      // Unreadable entries are dropped so the next call refetches.
      await this.delete(key);
      return undefined;
    }
  }

  async set(key: string, value: T, ttlSeconds?: number): Promise<void> {
    this.assertNotDestroyed();
    assertDynamoKeyPart(key, 'key');

    let serializedValue: string;
    try {
      serializedValue =
        value === undefined ? UNDEFINED_SENTINEL : JSON.stringify(value);
    } catch (error) {
      throw new Error(
        `Failed to serialize value: ${error instanceof Error ? error.message : String(error)}`,
      );
    }

    if (Buffer.byteLength(serializedValue, 'utf8') > this.maxEntrySizeBytes) {
      return;
    }

    const now = this.now();
    const expiresAt = expiresAtFor(ttlSeconds, now);
    const pk = `CACHE#${key}`;

    try {
      await this.docClient.send(
        new PutCommand({
          TableName: this.tableName,
          Item: {
            pk,
            sk: pk,
            value: serializedValue,
            expiresAt,
            // DynamoDB's own sweep runs late; reads still check expiresAt.
            [TTL_ATTRIBUTE]: expiresAt > 0 ? Math.ceil(expiresAt / 1000) : 0,
            createdAt: now,
          },
        }),
      );
    } catch (error: unknown) {
      throwIfDynamoTableMissing(error, this.tableName);
      throw error;
    }
  }

  async delete(key: string): Promise<void> {
    this.assertNotDestroyed();
    assertDynamoKeyPart(key, 'key');

    const pk = `CACHE#${key}`;

    try {
      await this.docClient.send(
        new DeleteCommand({
          TableName: this.tableName,
          Key: { pk, sk: pk },
        }),
      );
    } catch (error: unknown) {
      throwIfDynamoTableMissing(error, this.tableName);
      throw error;
    }
  }

  async exists(key: string): Promise<boolean> {
    return (await this.readLive(key)) !== undefined;
  }

  async clear(): Promise<void> {
    this.assertNotDestroyed();

    try {
      const keys = await scanKeys(this.docClient, {
        TableName: this.tableName,
        FilterExpression: 'begins_with(pk, :cachePrefix)',
        ExpressionAttributeValues: { ':cachePrefix': 'CACHE#' },
      });
      await deleteKeys(this.docClient, this.tableName, keys);
    } catch (error: unknown) {
      throwIfDynamoTableMissing(error, this.tableName);
      throw error;
    }
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

  /**
   * Reads an entry, deleting it when expired.
   */
  private async readLive(key: string): Promise<CachedEntry | undefined> {
    this.assertNotDestroyed();
    assertDynamoKeyPart(key, 'key');

    const pk = `CACHE#${key}`;

    let result;
    try {
      result = await this.docClient.send(
        new GetCommand({
          TableName: this.tableName,
          Key: { pk, sk: pk },
        }),
      );
    } catch (error: unknown) {
      throwIfDynamoTableMissing(error, this.tableName);
      throw error;
    }

    const entry = readEntry(result.Item);
    if (!entry) {
      return undefined;
    }

    if (isExpired(entry.expiresAt, this.now())) {
      await this.delete(key);
      return undefined;
    }

    return entry;
  }

  private assertNotDestroyed(): void {
    if (this.isDestroyed) {
      throw new Error('Cache store has been destroyed');
    }
  }
}
