/**
 * Runtime mapping errors. Every variant names the field it concerns, and the
 * read-side variants carry the raw record they were mapping.
 */

import type { AttributeMap, AttributeValue } from "../marshalling/types.js";
import type { MappingValidationError } from "../validation/errors.js";

/** A value could not be encoded to, or decoded from, its stored node. */
export interface ConversionError {
  readonly kind: "conversion";
  readonly message: string;
  readonly field: string;
  readonly direction: "encode" | "decode";
  readonly targetType: string;
  readonly node?: AttributeValue | undefined;
  readonly value?: unknown;
  readonly record?: AttributeMap | undefined;
  readonly cause?: unknown;
}

/** A derived key could not be computed because a source value was unset. */
export interface IncompleteKeyError {
  readonly kind: "incompleteKey";
  readonly message: string;
  readonly field: string;
  readonly missingSource: string;
}

/**
 * A key component could not be extracted under the strict policy. `index`
 * is -1 for template extraction.
 */
export interface KeyExtractionError {
  readonly kind: "keyExtraction";
  readonly message: string;
  readonly field: string;
  readonly source: string;
  readonly index: number;
  readonly value: string | undefined;
}

/** A record lacked a required attribute, so no entity could be built. */
export interface EntityConstructionError {
  readonly kind: "entityConstruction";
  readonly message: string;
  readonly schemaId: string;
  readonly field: string;
  readonly record: AttributeMap;
}

/** A domain object lacked a required value, so no record could be built. */
export interface SerializationError {
  readonly kind: "serialization";
  readonly message: string;
  readonly schemaId: string;
  readonly field: string;
}

/** The field encryptor was missing or failed. */
export interface EncryptionError {
  readonly kind: "encryption";
  readonly message: string;
  readonly field: string;
  readonly operation: "encrypt" | "decrypt";
  readonly cause?: unknown;
}

/** A record was handed to a schema it does not match. */
export interface DiscriminatorMismatchError {
  readonly kind: "discriminatorMismatch";
  readonly message: string;
  readonly schemaId: string;
  readonly record: AttributeMap;
}

/** The record store adapter threw. */
export interface StoreError {
  readonly kind: "store";
  readonly message: string;
  readonly operation: "putItem" | "getItem" | "query";
  readonly cause?: unknown;
}

/** Every error a mapping or store operation can return. */
export type MappingError =
  | ConversionError
  | IncompleteKeyError
  | KeyExtractionError
  | EntityConstructionError
  | SerializationError
  | EncryptionError
  | MappingValidationError
  | DiscriminatorMismatchError
  | StoreError;

const describeCause = (cause: unknown): string =>
  cause instanceof Error ? cause.message : String(cause);

/** Creates a ConversionError for a value that could not be encoded. */
export const createEncodeError = (
  field: string,
  targetType: string,
  value: unknown,
  reason: string,
  cause?: unknown,
): ConversionError =>
  Object.freeze({
    kind: "conversion" as const,
    message: `Cannot encode field "${field}" as ${targetType}: ${reason}`,
    field,
    direction: "encode" as const,
    targetType,
    value,
    ...(cause !== undefined ? { cause } : {}),
  });

/** Creates a ConversionError for a stored node that could not be decoded. */
export const createDecodeError = (
  field: string,
  targetType: string,
  node: AttributeValue | undefined,
  reason: string,
  cause?: unknown,
): ConversionError =>
  Object.freeze({
    kind: "conversion" as const,
    message: `Cannot decode field "${field}" as ${targetType}: ${reason}`,
    field,
    direction: "decode" as const,
    targetType,
    node,
    ...(cause !== undefined ? { cause } : {}),
  });

/** Returns a copy of a ConversionError reported against another field path. */
export const renameConversionField = (
  error: ConversionError,
  field: string,
): ConversionError =>
  Object.freeze({
    ...error,
    field,
    message: error.message.replace(`"${error.field}"`, `"${field}"`),
  });

/** Returns a copy of a ConversionError with the field path prefixed by `parent`. */
export const nestConversionError = (
  error: ConversionError,
  parent: string,
): ConversionError => renameConversionField(error, `${parent}.${error.field}`);

/** Returns a copy of a ConversionError that carries the record being read. */
export const attachRecord = (
  error: ConversionError,
  record: AttributeMap,
): ConversionError => Object.freeze({ ...error, record });

/** Creates an IncompleteKeyError. */
export const createIncompleteKeyError = (
  field: string,
  missingSource: string,
): IncompleteKeyError =>
  Object.freeze({
    kind: "incompleteKey" as const,
    message: `Cannot compute key "${field}": source "${missingSource}" has no value`,
    field,
    missingSource,
  });

/** Creates a KeyExtractionError. */
export const createKeyExtractionError = (
  field: string,
  source: string,
  index: number,
  value: string | undefined,
): KeyExtractionError =>
  Object.freeze({
    kind: "keyExtraction" as const,
    message:
      value === undefined
        ? `Cannot extract "${field}": source "${source}" has no value`
        : index < 0
          ? `Cannot extract "${field}": "${value}" does not match its key template`
          : `Cannot extract "${field}": "${value}" has no component at index ${index}`,
    field,
    source,
    index,
    value,
  });

/** Creates an EntityConstructionError for a missing required attribute. */
export const createEntityConstructionError = (
  schemaId: string,
  field: string,
  attributeName: string,
  record: AttributeMap,
): EntityConstructionError =>
  Object.freeze({
    kind: "entityConstruction" as const,
    message: `Cannot build ${schemaId}: required field "${field}" (attribute "${attributeName}") is missing`,
    schemaId,
    field,
    record,
  });

/** Creates a SerializationError for a missing required value. */
export const createSerializationError = (
  schemaId: string,
  field: string,
): SerializationError =>
  Object.freeze({
    kind: "serialization" as const,
    message: `Cannot serialize ${schemaId}: required field "${field}" has no value`,
    schemaId,
    field,
  });

/** Creates an EncryptionError. */
export const createEncryptionError = (
  field: string,
  operation: EncryptionError["operation"],
  reason: string,
  cause?: unknown,
): EncryptionError =>
  Object.freeze({
    kind: "encryption" as const,
    message: `Cannot ${operation} field "${field}": ${
      cause !== undefined ? `${reason}: ${describeCause(cause)}` : reason
    }`,
    field,
    operation,
    ...(cause !== undefined ? { cause } : {}),
  });

/** Creates a DiscriminatorMismatchError. */
export const createDiscriminatorMismatchError = (
  schemaId: string,
  record: AttributeMap,
): DiscriminatorMismatchError =>
  Object.freeze({
    kind: "discriminatorMismatch" as const,
    message: `Record does not match the ${schemaId} discriminator`,
    schemaId,
    record,
  });

/** Creates a StoreError wrapping an adapter failure. */
export const createStoreError = (
  operation: StoreError["operation"],
  cause: unknown,
): StoreError =>
  Object.freeze({
    kind: "store" as const,
    message: `${operation} failed: ${describeCause(cause)}`,
    operation,
    cause,
  });
