/**
 * Put operation: maps an entity to a record and writes it.
 */

import type { RecordStoreAdapter } from "../adapters/adapter.js";
import { toRecord } from "../mapping/record-mapper.js";
import type { AttributeMap } from "../marshalling/types.js";
import { type Result, ok, err } from "../types/common.js";
import { type MappingError, createStoreError } from "../types/errors.js";
import type { PutOptions } from "../types/operations.js";
import type { SchemaModel } from "../types/schema.js";

/**
 * Executes a Put for one entity.
 *
 * @returns The record that was written
 *
 * @example
 * ```ts
 * const result = await executePut(customerModel, adapter, customer, { ifNotExists: true });
 * ```
 */
export const executePut = async <T extends object>(
  model: SchemaModel<T>,
  adapter: RecordStoreAdapter,
  entity: T,
  options: PutOptions = {},
): Promise<Result<AttributeMap, MappingError>> => {
  // 1. Map to a record (validation, derived keys, encryption)
  const record = await toRecord(entity, model, options);
  if (!record.success) return record;

  // 2. Write, optionally refusing to overwrite
  try {
    await adapter.putItem({
      tableName: model.tableName,
      item: record.data,
      ...(options.ifNotExists
        ? {
            conditionExpression: "attribute_not_exists(#pk)",
            expressionAttributeNames: { "#pk": model.partitionKey.storedName },
          }
        : {}),
    });
  } catch (cause) {
    return err(createStoreError("putItem", cause));
  }

  return ok(record.data);
};
