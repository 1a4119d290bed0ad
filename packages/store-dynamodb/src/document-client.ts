import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';

export type DynamoDBClientOption = DynamoDBDocumentClient | DynamoDBClient;

export interface ResolvedClient {
  docClient: DynamoDBDocumentClient;
  /** Low-level client for table management, when one is reachable. */
  tableClient: DynamoDBClient | undefined;
  /** Created here; whoever resolved it must destroy it. */
  owned: DynamoDBClient | undefined;
}

/**
 * Accepts either client flavour, or creates one for `region` when none is
 * given. A caller-supplied client is never owned.
 */
export function resolveDocumentClient(
  client: DynamoDBClientOption | undefined,
  region: string | undefined,
): ResolvedClient {
  if (client instanceof DynamoDBDocumentClient) {
    return { docClient: client, tableClient: undefined, owned: undefined };
  }
  if (client instanceof DynamoDBClient) {
    return {
      docClient: DynamoDBDocumentClient.from(client),
      tableClient: client,
      owned: undefined,
    };
  }

  const created = new DynamoDBClient(region ? { region } : {});
  return {
    docClient: DynamoDBDocumentClient.from(created),
    tableClient: created,
    owned: created,
  };
}
