/**
 * Get operation: builds the primary key and reads one record.
 */

import type { RecordStoreAdapter } from "../adapters/adapter.js";
import { computeKeyAttributes } from "../keys/key-builder.js";
import { fromMatchingRecord } from "../mapping/record-mapper.js";
import { type Result, ok, err } from "../types/common.js";
import { type MappingError, createStoreError } from "../types/errors.js";
import type { GetOptions } from "../types/operations.js";
import type { SchemaModel } from "../types/schema.js";

/**
 * Executes a Get for one entity.
 *
 * `key` holds the fields the primary key is derived from, e.g.
 * `{ tenantId: "T1", customerId: "C1" }`. A record stored under that key
 * that is another shape fails with `discriminatorMismatch`.
 *
 * @returns The entity, or `undefined` when no record exists
 */
export const executeGet = async <T extends object>(
  model: SchemaModel<T>,
  adapter: RecordStoreAdapter,
  key: Partial<T>,
  options: GetOptions = {},
): Promise<Result<T | undefined, MappingError>> => {
  const keyAttributes = computeKeyAttributes(key, model);
  if (!keyAttributes.success) return keyAttributes;

  let item;
  try {
    const output = await adapter.getItem({
      tableName: model.tableName,
      key: keyAttributes.data,
      consistentRead: options.consistentRead,
    });
    item = output.item;
  } catch (cause) {
    return err(createStoreError("getItem", cause));
  }

  if (item === undefined) return ok(undefined);
  return fromMatchingRecord(item, model, options);
};
