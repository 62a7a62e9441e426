/**
 * Partition query: reads every record under one partition key and
 * reconstructs the entities stored there.
 */

import type { RecordStoreAdapter } from "../adapters/adapter.js";
import { computePartitionKeyValue } from "../keys/key-builder.js";
import type { AttributeMap, AttributeValue } from "../marshalling/types.js";
import { reconstruct } from "../reconstruction/reconstruct.js";
import { type Result, ok, err } from "../types/common.js";
import { type MappingError, createStoreError } from "../types/errors.js";
import type { QueryOptions, ReconstructionResult } from "../types/operations.js";
import type { SchemaModel } from "../types/schema.js";

/**
 * Reads a whole partition, following `lastEvaluatedKey` until the store
 * reports no more pages.
 */
export const queryPartition = async (
  model: SchemaModel,
  adapter: RecordStoreAdapter,
  partitionKey: AttributeValue,
  options: QueryOptions = {},
): Promise<Result<readonly AttributeMap[], MappingError>> => {
  const items: AttributeMap[] = [];
  let exclusiveStartKey: AttributeMap | undefined;
  do {
    try {
      const page = await adapter.query({
        tableName: model.tableName,
        keyConditionExpression: "#pk = :pk",
        expressionAttributeNames: { "#pk": model.partitionKey.storedName },
        expressionAttributeValues: { ":pk": partitionKey },
        exclusiveStartKey,
        consistentRead: options.consistentRead,
        limit: options.limit,
      });
      items.push(...page.items);
      exclusiveStartKey = page.lastEvaluatedKey;
    } catch (cause) {
      return err(createStoreError("query", cause));
    }
  } while (exclusiveStartKey !== undefined);

  return ok(items);
};

/**
 * Executes a partition query for one entity and reconstructs it together
 * with its related records.
 *
 * `key` holds the fields the partition key is derived from.
 *
 * @example
 * ```ts
 * const result = await executeQuery(orderModel, adapter, { orderId: "O1" });
 * if (result.success) console.log(result.data.entities[0]?.lines);
 * ```
 */
export const executeQuery = async <T extends object>(
  model: SchemaModel<T>,
  adapter: RecordStoreAdapter,
  key: Partial<T>,
  options: QueryOptions = {},
): Promise<Result<ReconstructionResult<T>, MappingError>> => {
  // 1. Partition key from the derived-key rules
  const partitionKey = computePartitionKeyValue(key, model);
  if (!partitionKey.success) return partitionKey;

  // 2. Every page of the partition
  const items = await queryPartition(model, adapter, partitionKey.data, options);
  if (!items.success) return items;

  // 3. Rebuild entities from the flat record list
  return reconstruct(items.data, model, options);
};
