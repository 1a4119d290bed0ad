import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import {
  DynamoDBDocumentClient,
  BatchWriteCommand,
  ScanCommand,
} from '@aws-sdk/lib-dynamodb';
import type { SleepFn } from '@sandbox-kit/core';
import { mockClient } from 'aws-sdk-client-mock';
import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';
import {
  assertDynamoKeyPart,
  deleteKeys,
  isConditionalCheckFailure,
  scanKeys,
  type ItemKey,
} from './dynamodb-utils.js';

const ddbMock = mockClient(DynamoDBDocumentClient);
const docClient = DynamoDBDocumentClient.from(new DynamoDBClient({}));
const TABLE_NAME = 'test-table';

const unprocessed = (...keys: Array<ItemKey>) => ({
  UnprocessedItems: {
    [TABLE_NAME]: keys.map((Key) => ({ DeleteRequest: { Key } })),
  },
});

describe('deleteKeys', () => {
  let sleep: Mock<SleepFn>;

  beforeEach(() => {
    ddbMock.reset();
    sleep = vi.fn<SleepFn>(async () => {});
  });

  it('sends one batch when everything is processed', async () => {
    ddbMock.on(BatchWriteCommand).resolves({ UnprocessedItems: {} });

    await deleteKeys(docClient, TABLE_NAME, [{ pk: 'k1', sk: 's1' }], { sleep });

    const input = ddbMock.commandCalls(BatchWriteCommand)[0]?.args[0].input;
    expect(input?.RequestItems).toEqual({
      [TABLE_NAME]: [{ DeleteRequest: { Key: { pk: 'k1', sk: 's1' } } }],
    });
    expect(sleep).not.toHaveBeenCalled();
  });

  it('splits keys into batches of 25', async () => {
    ddbMock.on(BatchWriteCommand).resolves({});
    const keys = Array.from({ length: 30 }, (_, i) => ({
      pk: `CACHE#${i}`,
      sk: `CACHE#${i}`,
    }));

    await deleteKeys(docClient, TABLE_NAME, keys, { sleep });

    const sizes = ddbMock
      .commandCalls(BatchWriteCommand)
      .map((call) => call.args[0].input.RequestItems?.[TABLE_NAME]?.length);
    expect(sizes).toEqual([25, 5]);
  });

  it('resubmits unprocessed keys after a backoff', async () => {
    ddbMock
      .on(BatchWriteCommand)
      .resolvesOnce(unprocessed({ pk: 'k2', sk: 's2' }))
      .resolvesOnce({ UnprocessedItems: {} });

    await deleteKeys(
      docClient,
      TABLE_NAME,
      [
        { pk: 'k1', sk: 's1' },
        { pk: 'k2', sk: 's2' },
      ],
      { sleep, random: () => 0 },
    );

    const retry = ddbMock.commandCalls(BatchWriteCommand)[1]?.args[0].input;
    expect(retry?.RequestItems?.[TABLE_NAME]).toEqual([
      { DeleteRequest: { Key: { pk: 'k2', sk: 's2' } } },
    ]);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([50]);
  });

  it('gives up after maxAttempts with a capped backoff', async () => {
    ddbMock.on(BatchWriteCommand).resolves(unprocessed({ pk: 'k1', sk: 's1' }));

    await expect(
      deleteKeys(docClient, TABLE_NAME, [{ pk: 'k1', sk: 's1' }], {
        sleep,
        random: () => 0,
      }),
    ).rejects.toThrow(
      `Gave up deleting 1 item(s) from table "${TABLE_NAME}" after 9 attempts`,
    );

    expect(ddbMock.commandCalls(BatchWriteCommand)).toHaveLength(9);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([
      50, 100, 200, 400, 800, 1000, 1000, 1000,
    ]);
  });

  it('honours a smaller maxAttempts', async () => {
    ddbMock.on(BatchWriteCommand).resolves(unprocessed({ pk: 'k1', sk: 's1' }));

    await expect(
      deleteKeys(docClient, TABLE_NAME, [{ pk: 'k1', sk: 's1' }], {
        sleep,
        maxAttempts: 2,
      }),
    ).rejects.toThrow('after 2 attempts');
    expect(ddbMock.commandCalls(BatchWriteCommand)).toHaveLength(2);
  });

  it('ignores unprocessed requests that carry no usable key', async () => {
    ddbMock
      .on(BatchWriteCommand)
      .resolvesOnce({
        UnprocessedItems: {
          [TABLE_NAME]: [
            { DeleteRequest: { Key: { pk: 'k1', sk: 's1' } } },
            { DeleteRequest: undefined } as never,
            { DeleteRequest: { Key: { pk: 'k3' } } },
          ],
        },
      })
      .resolvesOnce({});

    await deleteKeys(docClient, TABLE_NAME, [{ pk: 'k1', sk: 's1' }], { sleep });

    const retry = ddbMock.commandCalls(BatchWriteCommand)[1]?.args[0].input;
    expect(retry?.RequestItems?.[TABLE_NAME]).toHaveLength(1);
  });

  it('does nothing for an empty key list', async () => {
    await deleteKeys(docClient, TABLE_NAME, [], { sleep });

    expect(ddbMock.calls()).toHaveLength(0);
  });
});

describe('scanKeys', () => {
  beforeEach(() => {
    ddbMock.reset();
  });

  it('collects keys across pages and drops other attributes', async () => {
    ddbMock
      .on(ScanCommand)
      .resolvesOnce({
        Items: [{ pk: 'CACHE#a', sk: 'CACHE#a', value: '1' }],
        LastEvaluatedKey: { pk: 'CACHE#a', sk: 'CACHE#a' },
      })
      .resolvesOnce({ Items: [{ pk: 'CACHE#b', sk: 'CACHE#b', value: '2' }] });

    const keys = await scanKeys(docClient, { TableName: TABLE_NAME });

    expect(keys).toEqual([
      { pk: 'CACHE#a', sk: 'CACHE#a' },
      { pk: 'CACHE#b', sk: 'CACHE#b' },
    ]);
    const secondScan = ddbMock.commandCalls(ScanCommand)[1]?.args[0].input;
    expect(secondScan?.ExclusiveStartKey).toEqual({
      pk: 'CACHE#a',
      sk: 'CACHE#a',
    });
    expect(secondScan?.ProjectionExpression).toBe('pk, sk');
  });

  it('returns an empty list when nothing matches', async () => {
    ddbMock.on(ScanCommand).resolvesOnce({});

    await expect(scanKeys(docClient, { TableName: TABLE_NAME })).resolves.toEqual(
      [],
    );
  });
});

describe('isConditionalCheckFailure', () => {
  it('recognises a failed condition', () => {
    const error = new Error('The conditional request failed');
    error.name = 'ConditionalCheckFailedException';
    expect(isConditionalCheckFailure(error)).toBe(true);
  });

  it('ignores other errors and non-errors', () => {
    expect(isConditionalCheckFailure(new Error('boom'))).toBe(false);
    expect(isConditionalCheckFailure({ name: 'ConditionalCheckFailedException' })).toBe(false);
    expect(isConditionalCheckFailure(undefined)).toBe(false);
  });
});

describe('assertDynamoKeyPart', () => {
  it.each([
    ['a null byte', 'abc\x00def'],
    ['a tab', 'abc\tdef'],
    ['a newline', 'abc\ndef'],
    ['unit separator', 'abc\x1fdef'],
    ['DEL', 'abc\x7fdef'],
  ])('rejects %s', (_label, value) => {
    expect(() => assertDynamoKeyPart(value, 'resource')).toThrow(
      'resource contains unsupported control characters',
    );
  });

  it('accepts printable text including spaces and tildes', () => {
    expect(() => assertDynamoKeyPart('sandbox:get analysis~1', 'key')).not.toThrow();
  });

  it('throws for an empty value', () => {
    expect(() => assertDynamoKeyPart('', 'key')).toThrow('key must not be empty');
  });

  it('counts bytes rather than characters', () => {
    expect(() => assertDynamoKeyPart('é'.repeat(3), 'key', 5)).toThrow(
      'key exceeds maximum length of 5 bytes',
    );
    expect(() => assertDynamoKeyPart('é'.repeat(2), 'key', 5)).not.toThrow();
  });
});
