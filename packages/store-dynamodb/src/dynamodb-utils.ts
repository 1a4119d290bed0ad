import {
  BatchWriteCommand,
  ScanCommand,
  type DynamoDBDocumentClient,
  type ScanCommandInput,
} from '@aws-sdk/lib-dynamodb';
import { sleep as defaultSleep, type SleepFn } from '@sandbox-kit/core';

export type ItemKey = { pk: string; sk: string };

/** BatchWriteItem accepts at most this many requests. */
const BATCH_SIZE = 25;
const MAX_KEY_PART_BYTES = 512;

function isItemKey(value: unknown): value is ItemKey {
  return (
    typeof value === 'object' &&
    value !== null &&
    'pk' in value &&
    'sk' in value &&
    typeof value.pk === 'string' &&
    typeof value.sk === 'string'
  );
}

export interface DeleteKeysOptions {
  /** Sends per batch before giving up on unprocessed items. Defaults to 9. */
  maxAttempts?: number;
  sleep?: SleepFn;
  random?: () => number;
}

/**
 * Deletes `keys` in batches, resubmitting whatever DynamoDB reports as
 * unprocessed with a capped exponential backoff.
 */
export async function deleteKeys(
  docClient: DynamoDBDocumentClient,
  tableName: string,
  keys: ReadonlyArray<ItemKey>,
  {
    maxAttempts = 9,
    sleep = defaultSleep,
    random = Math.random,
  }: DeleteKeysOptions = {},
): Promise<void> {
  for (let start = 0; start < keys.length; start += BATCH_SIZE) {
    let pending = keys.slice(start, start + BATCH_SIZE);

    for (let attempt = 1; pending.length > 0; attempt++) {
      const response = await docClient.send(
        new BatchWriteCommand({
          RequestItems: {
            [tableName]: pending.map((Key) => ({ DeleteRequest: { Key } })),
          },
        }),
      );
      pending = (response.UnprocessedItems?.[tableName] ?? [])
        .map((request) => request.DeleteRequest?.Key)
        .filter(isItemKey);

      if (pending.length === 0) {
        break;
      }
      if (attempt >= maxAttempts) {
        throw new Error(
          `Gave up deleting ${pending.length} item(s) from table "${tableName}" after ${attempt} attempts`,
        );
      }
      await sleep(
        Math.min(1000, 50 * 2 ** (attempt - 1)) + Math.floor(random() * 25),
      );
    }
  }
}

/**
 * Keys of every item matching the scan, across all pages.
 */
export async function scanKeys(
  docClient: DynamoDBDocumentClient,
  input: Omit<ScanCommandInput, 'ProjectionExpression' | 'ExclusiveStartKey'>,
): Promise<Array<ItemKey>> {
  const keys: Array<ItemKey> = [];
  let startKey: ScanCommandInput['ExclusiveStartKey'];

  do {
    const page = await docClient.send(
      new ScanCommand({
        ...input,
        ProjectionExpression: 'pk, sk',
        ExclusiveStartKey: startKey,
      }),
    );
    keys.push(...(page.Items ?? []).filter(isItemKey).map(({ pk, sk }) => ({ pk, sk })));
    startKey = page.LastEvaluatedKey;
  } while (startKey);

  return keys;
}

export function isConditionalCheckFailure(error: unknown): boolean {
  return (
    error instanceof Error && error.name === 'ConditionalCheckFailedException'
  );
}

/**
 * Cache keys and resource names become key attributes, which must be
 * non-empty, printable and at most 512 bytes here.
 */
export function assertDynamoKeyPart(
  value: string,
  label: string,
  maxBytes = MAX_KEY_PART_BYTES,
): void {
  if (value === '') {
    throw new Error(`${label} must not be empty`);
  }
  // eslint-disable-next-line no-control-regex
  if (/[\u0000-\u001f\u007f]/.test(value)) {
    throw new Error(`${label} contains unsupported control characters`);
  }
  if (Buffer.byteLength(value, 'utf8') > maxBytes) {
    throw new Error(`${label} exceeds maximum length of ${maxBytes} bytes`);
  }
}
