import { ResourceNotFoundException } from '@aws-sdk/client-dynamodb';

export function isDynamoTableMissing(error: unknown): boolean {
  return (
    error instanceof ResourceNotFoundException ||
    (error instanceof Error && error.name === 'ResourceNotFoundException')
  );
}

/**
 * Rethrows a missing-table error with a message naming the table. Any other
 * error is left for the caller to rethrow.
 */
export function throwIfDynamoTableMissing(
  error: unknown,
  tableName: string,
): void {
  if (!isDynamoTableMissing(error)) {
    return;
  }
  throw new Error(
    `DynamoDB table "${tableName}" was not found. Create the table using your infrastructure, or call ensureTable() before using the store.`,
    { cause: error },
  );
}
