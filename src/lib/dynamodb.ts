/**
 * DynamoDB Document Client singleton and the helpers the transaction store uses.
 */

import { ConditionalCheckFailedException, DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { DeleteCommand, DynamoDBDocumentClient, PutCommand, QueryCommand } from '@aws-sdk/lib-dynamodb';

const defaultClient = new DynamoDBClient({
  ...(process.env.AWS_REGION ? { region: process.env.AWS_REGION } : {}),
});

export const docClient = DynamoDBDocumentClient.from(defaultClient, {
  marshallOptions: { convertEmptyValues: false, removeUndefinedValues: true },
});

export type Item = Record<string, unknown>;

export async function putItem(tableName: string, item: Item, condition?: string): Promise<void> {
  await docClient.send(
    new PutCommand({
      TableName: tableName,
      Item: item,
      ...(condition ? { ConditionExpression: condition } : {}),
    })
  );
}

export async function queryItems(
  tableName: string,
  keyCondition: string,
  attrValues: Item,
  options?: { scanIndexForward?: boolean; limit?: number; exclusiveStartKey?: Item }
): Promise<{ items: Item[]; lastEvaluatedKey?: Item }> {
  const result = await docClient.send(
    new QueryCommand({
      TableName: tableName,
      KeyConditionExpression: keyCondition,
      ExpressionAttributeValues: attrValues,
      ScanIndexForward: options?.scanIndexForward,
      Limit: options?.limit,
      ExclusiveStartKey: options?.exclusiveStartKey,
    })
  );
  return { items: result.Items ?? [], lastEvaluatedKey: result.LastEvaluatedKey };
}

export async function deleteItem(tableName: string, key: Item): Promise<void> {
  await docClient.send(new DeleteCommand({ TableName: tableName, Key: key }));
}

export function isConditionalCheckFailed(err: unknown): boolean {
  return (
    err instanceof ConditionalCheckFailedException ||
    (err instanceof Error && err.name === 'ConditionalCheckFailedException')
  );
}
