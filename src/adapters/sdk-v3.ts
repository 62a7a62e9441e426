/**
 * AWS SDK v3 DynamoDB client adapter.
 *
 * Binds a `@aws-sdk/client-dynamodb` client without importing the SDK: the
 * caller passes the client and the command constructors.
 */

import type { RecordStoreAdapter } from "./adapter.js";
import type { AttributeMap } from "../marshalling/types.js";

/** Minimal interface for the AWS SDK v3 DynamoDBClient. */
interface DynamoDBClientV3 {
  send(command: unknown): Promise<unknown>;
}

/** Minimal command constructor shape. */
interface CommandConstructor {
  new (input: unknown): unknown;
}

/**
 * Creates a record store adapter for the AWS SDK v3 DynamoDB client.
 *
 * @example
 * ```ts
 * import { DynamoDBClient, PutItemCommand, GetItemCommand, QueryCommand } from "@aws-sdk/client-dynamodb";
 * const adapter = createSDKv3Adapter(new DynamoDBClient({}), {
 *   PutItemCommand, GetItemCommand, QueryCommand,
 * });
 * ```
 */
export const createSDKv3Adapter = (
  client: DynamoDBClientV3,
  commands: {
    readonly PutItemCommand: CommandConstructor;
    readonly GetItemCommand: CommandConstructor;
    readonly QueryCommand: CommandConstructor;
  },
): RecordStoreAdapter =>
  Object.freeze<RecordStoreAdapter>({
    putItem: async (input) => {
      await client.send(
        new commands.PutItemCommand({
          TableName: input.tableName,
          Item: input.item,
          ConditionExpression: input.conditionExpression,
          ExpressionAttributeNames: input.expressionAttributeNames,
        }),
      );
    },

    getItem: async (input) => {
      const result = (await client.send(
        new commands.GetItemCommand({
          TableName: input.tableName,
          Key: input.key,
          ConsistentRead: input.consistentRead,
        }),
      )) as { Item?: AttributeMap };
      return { item: result.Item };
    },

    query: async (input) => {
      const result = (await client.send(
        new commands.QueryCommand({
          TableName: input.tableName,
          KeyConditionExpression: input.keyConditionExpression,
          ExpressionAttributeNames: input.expressionAttributeNames,
          ExpressionAttributeValues: input.expressionAttributeValues,
          ExclusiveStartKey: input.exclusiveStartKey,
          ConsistentRead: input.consistentRead,
          Limit: input.limit,
        }),
      )) as { Items?: AttributeMap[]; LastEvaluatedKey?: AttributeMap };
      return {
        items: result.Items ?? [],
        lastEvaluatedKey: result.LastEvaluatedKey,
      };
    },
  });
