import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';
import { describe, it, expect } from 'vitest';
import { resolveDocumentClient } from './document-client.js';

describe('resolveDocumentClient', () => {
  it('uses a document client as given', () => {
    const docClient = DynamoDBDocumentClient.from(new DynamoDBClient({}));

    const resolved = resolveDocumentClient(docClient, 'eu-west-1');

    expect(resolved).toEqual({
      docClient,
      tableClient: undefined,
      owned: undefined,
    });
  });

  it('wraps a low-level client without taking ownership', () => {
    const client = new DynamoDBClient({ region: 'us-east-1' });

    const resolved = resolveDocumentClient(client, undefined);

    expect(resolved.docClient).toBeInstanceOf(DynamoDBDocumentClient);
    expect(resolved.tableClient).toBe(client);
    expect(resolved.owned).toBeUndefined();
    client.destroy();
  });

  it('creates and owns a client for the region', async () => {
    const resolved = resolveDocumentClient(undefined, 'eu-west-1');

    expect(resolved.owned).toBeInstanceOf(DynamoDBClient);
    expect(resolved.tableClient).toBe(resolved.owned);
    await expect(resolved.owned?.config.region()).resolves.toBe('eu-west-1');
    resolved.owned?.destroy();
  });
});
