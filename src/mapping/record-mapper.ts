/**
 * Converts domain objects to raw records and back, driven by a schema model.
 */

import { decodeValue, encodeValue } from "../codec/value-codec.js";
import { matches } from "../discrimination/entity-discriminator.js";
import { applyDerivedKeys } from "../keys/key-builder.js";
import { extractComponents } from "../keys/key-extractor.js";
import {
  type AttributeMap,
  type AttributeValue,
  scalarText,
} from "../marshalling/types.js";
import { type Result, ok, err } from "../types/common.js";
import {
  type MappingError,
  attachRecord,
  createDiscriminatorMismatchError,
  createEntityConstructionError,
  createSerializationError,
} from "../types/errors.js";
import { silentLogger } from "../types/logger.js";
import type { MappingOptions } from "../types/operations.js";
import type { FieldDescriptor, SchemaModel } from "../types/schema.js";
import { validate } from "../validation/validate.js";
import { decryptNode, encryptNode, encryptionContext } from "./encryption.js";

const isUnset = (value: unknown): boolean => value === undefined || value === null;

const isRequired = (field: FieldDescriptor): boolean =>
  !field.isNullable && field.collectionKind !== "set";

const partitionKeyText = (
  source: Readonly<Record<string, unknown>>,
  model: SchemaModel,
): string | undefined => {
  const encoded = encodeValue(source[model.partitionKey.sourceName], model.partitionKey);
  return encoded.success ? scalarText(encoded.data) : undefined;
};

/**
 * Converts a domain object into a raw record.
 *
 * Steps: validate against the entity's Standard Schema (when configured and
 * enabled), compute derived keys on a copy, encode every stored field,
 * encrypt marked fields, then write the discriminator attribute when it is a
 * literal no field maps. Unset values are omitted unless the field is
 * nullable with `storeNull`.
 *
 * @example
 * ```ts
 * const result = await toRecord({ tenantId: "T1", customerId: "C1", name: "Ada" }, customerModel);
 * // result.data: { pk: { S: "T1#C1" }, sk: { S: "PROFILE" }, name: { S: "Ada" } }
 * ```
 */
export const toRecord = async <T extends object>(
  entity: T,
  model: SchemaModel<T>,
  options: MappingOptions = {},
): Promise<Result<AttributeMap, MappingError>> => {
  let input: object = entity;
  if (options.validation !== false && model.schema !== undefined) {
    const validated = await validate(model.schema, entity, { schemaId: model.entityId, phase: "write" });
    if (!validated.success) return validated;
    input = validated.data;
  }

  const derived = applyDerivedKeys(input, model);
  if (!derived.success) return derived;
  const source = derived.data;

  const record: Record<string, AttributeValue> = {};
  const partitionKey = partitionKeyText(source, model);

  for (const field of model.storedFields) {
    const value = source[field.sourceName];
    if (isUnset(value) && isRequired(field)) {
      return err(createSerializationError(model.entityId, field.sourceName));
    }

    const encoded = encodeValue(value, field);
    if (!encoded.success) return encoded;
    let node = encoded.data;
    if (node === undefined) continue;

    if (field.encrypted && !("NULL" in node)) {
      const context = encryptionContext(model.entityId, field, partitionKey);
      const encrypted = await encryptNode(node, field, context, options.fieldEncryptor);
      if (!encrypted.success) return encrypted;
      node = encrypted.data;
    }
    record[field.storedName] = node;
  }

  const literal = model.discriminatorLiteral;
  if (literal !== undefined && record[literal.attributeName] === undefined) {
    record[literal.attributeName] = { S: literal.value };
  }

  return ok(Object.freeze(record));
};

/**
 * Decodes a raw record into the plain property bag of `model`: stored fields
 * decoded (and decrypted), extracted fields assigned, collection
 * relationships initialised to `[]`. No Standard Schema validation runs.
 */
export const readRecord = async (
  record: AttributeMap,
  model: SchemaModel,
  options: MappingOptions = {},
): Promise<Result<Record<string, unknown>, MappingError>> => {
  const target: Record<string, unknown> = {};
  const partitionKey = scalarText(record[model.partitionKey.storedName]);

  for (const field of model.storedFields) {
    let node = record[field.storedName];
    const absent = node === undefined || "NULL" in node;
    if (absent && isRequired(field)) {
      return err(createEntityConstructionError(model.entityId, field.sourceName, field.storedName, record));
    }

    if (field.encrypted && node !== undefined && !("NULL" in node)) {
      const context = encryptionContext(model.entityId, field, partitionKey);
      const decrypted = await decryptNode(node, field, context, options.fieldEncryptor);
      if (!decrypted.success) return decrypted;
      node = decrypted.data;
    }

    const decoded = decodeValue(node, field);
    if (!decoded.success) return err(attachRecord(decoded.error, record));
    if (decoded.data !== undefined) target[field.sourceName] = decoded.data;
  }

  const extraction = {
    policy: options.extraction,
    logger: options.logger ?? silentLogger,
    entityId: model.entityId,
  };
  for (const field of model.extractedFields) {
    const extracted = extractComponents(target, field, extraction);
    if (!extracted.success) {
      return err(extracted.error.kind === "conversion" ? attachRecord(extracted.error, record) : extracted.error);
    }
  }

  for (const relationship of model.relationships) {
    if (relationship.isCollection) target[relationship.targetFieldName] = [];
  }

  return ok(target);
};

/**
 * Turns a decoded property bag into the domain object, running the entity's
 * Standard Schema when configured and enabled.
 */
export const finalizeEntity = async <T extends object>(
  properties: Record<string, unknown>,
  model: SchemaModel<T>,
  options: MappingOptions = {},
): Promise<Result<T, MappingError>> => {
  if (options.validation !== false && model.schema !== undefined) {
    return validate(model.schema, properties, { schemaId: model.entityId, phase: "read" });
  }
  // Without a schema the decoded properties are the entity; their types
  // follow the field descriptors the definition declared for T.
  return ok(properties as T);
};

/**
 * Converts a raw record into a domain object.
 *
 * A required field whose attribute is missing (or `NULL`) fails with an
 * `entityConstruction` error naming the field.
 *
 * @example
 * ```ts
 * const result = await fromRecord({ pk: { S: "T1#C1" }, sk: { S: "PROFILE" }, name: { S: "Ada" } }, customerModel);
 * // result.data: { pk: "T1#C1", sk: "PROFILE", name: "Ada", tenantId: "T1", customerId: "C1" }
 * ```
 */
export const fromRecord = async <T extends object>(
  record: AttributeMap,
  model: SchemaModel<T>,
  options: MappingOptions = {},
): Promise<Result<T, MappingError>> => {
  const properties = await readRecord(record, model, options);
  if (!properties.success) return properties;
  return finalizeEntity(properties.data, model, options);
};

/**
 * Like `fromRecord()`, but first checks the record against the model's
 * discriminator and fails with `discriminatorMismatch` when it is another
 * shape.
 */
export const fromMatchingRecord = async <T extends object>(
  record: AttributeMap,
  model: SchemaModel<T>,
  options: MappingOptions = {},
): Promise<Result<T, MappingError>> =>
  matches(record, model)
    ? fromRecord(record, model, options)
    : err(createDiscriminatorMismatchError(model.entityId, record));
