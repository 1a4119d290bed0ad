import {
  CreateTableCommand,
  DescribeTableCommand,
  ResourceInUseException,
  ResourceNotFoundException,
  UpdateTimeToLiveCommand,
  type AttributeDefinition,
  type DynamoDBClient,
  type KeySchemaElement,
  type TableStatus,
} from '@aws-sdk/client-dynamodb';
import { sleep as defaultSleep, type SleepFn } from '@sandbox-kit/core';

export const DEFAULT_TABLE_NAME = 'sandbox-kit';

/** Epoch-seconds attribute DynamoDB uses to expire items on its own. */
export const TTL_ATTRIBUTE = 'ttl';

export const TABLE_SCHEMA: {
  KeySchema: Array<KeySchemaElement>;
  AttributeDefinitions: Array<AttributeDefinition>;
} = {
  KeySchema: [
    { AttributeName: 'pk', KeyType: 'HASH' },
    { AttributeName: 'sk', KeyType: 'RANGE' },
  ],
  AttributeDefinitions: [
    { AttributeName: 'pk', AttributeType: 'S' },
    { AttributeName: 'sk', AttributeType: 'S' },
  ],
};

export interface TableWaitOptions {
  /** Defaults to 1000. */
  pollIntervalMs?: number;
  /** Defaults to 30000. */
  maxWaitMs?: number;
  sleep?: SleepFn;
}

/**
 * Current status of the table, or `undefined` when it does not exist.
 */
export async function describeTableStatus(
  client: DynamoDBClient,
  tableName: string,
): Promise<TableStatus | undefined> {
  try {
    const { Table } = await client.send(
      new DescribeTableCommand({ TableName: tableName }),
    );
    return Table?.TableStatus;
  } catch (error) {
    if (error instanceof ResourceNotFoundException) {
      return undefined;
    }
    throw error;
  }
}

export async function waitForTable(
  client: DynamoDBClient,
  tableName: string,
  {
    pollIntervalMs = 1000,
    maxWaitMs = 30_000,
    sleep = defaultSleep,
  }: TableWaitOptions = {},
): Promise<void> {
  for (let waited = 0; ; waited += pollIntervalMs) {
    if ((await describeTableStatus(client, tableName)) === 'ACTIVE') {
      return;
    }
    if (waited >= maxWaitMs) {
      throw new Error(
        `Table ${tableName} did not become active within ${maxWaitMs}ms`,
      );
    }
    await sleep(pollIntervalMs);
  }
}

/**
 * Creates the on-demand table, waits for it and turns on item expiry. When
 * another process created it first, only the wait happens.
 */
export async function createTable(
  client: DynamoDBClient,
  tableName: string = DEFAULT_TABLE_NAME,
  options: TableWaitOptions = {},
): Promise<void> {
  let createdHere = true;
  try {
    await client.send(
      new CreateTableCommand({
        TableName: tableName,
        ...TABLE_SCHEMA,
        BillingMode: 'PAY_PER_REQUEST',
      }),
    );
  } catch (error) {
    if (!(error instanceof ResourceInUseException)) {
      throw error;
    }
    createdHere = false;
  }

  await waitForTable(client, tableName, options);

  if (createdHere) {
    await client.send(
      new UpdateTimeToLiveCommand({
        TableName: tableName,
        TimeToLiveSpecification: { AttributeName: TTL_ATTRIBUTE, Enabled: true },
      }),
    );
  }
}

export async function ensureTable(
  client: DynamoDBClient,
  tableName: string = DEFAULT_TABLE_NAME,
  options: TableWaitOptions = {},
): Promise<void> {
  const status = await describeTableStatus(client, tableName);
  if (status === 'ACTIVE') {
    return;
  }
  if (status === undefined) {
    await createTable(client, tableName, options);
    return;
  }
  await waitForTable(client, tableName, options);
}
