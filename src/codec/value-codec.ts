/**
 * Bidirectional conversion between domain values and AttributeValue nodes,
 * driven by a field descriptor.
 */

import { marshallValue } from "../marshalling/marshall.js";
import {
  type AttributeValue,
  attributeTypeLabel,
  describeAttributeValue,
  getAttributeValueType,
} from "../marshalling/types.js";
import { unmarshallValue } from "../marshalling/unmarshall.js";
import { type Result, ok, err } from "../types/common.js";
import {
  type ConversionError,
  createDecodeError,
  createEncodeError,
  nestConversionError,
  renameConversionField,
} from "../types/errors.js";
import type { FieldDescriptor } from "../types/schema.js";
import {
  formatDateTime,
  formatNumber,
  isEpochFormat,
  parseDateTimeText,
  parseEpoch,
} from "./formats.js";

type Encoded = Result<AttributeValue, ConversionError>;
type Decoded = Result<unknown, ConversionError>;

/** Reads a property from any object without widening it to a record type. */
export const readField = (source: object, name: string): unknown =>
  Reflect.get(source, name);

const isPlainObject = (value: unknown): value is object =>
  typeof value === "object" &&
  value !== null &&
  !Array.isArray(value) &&
  !(value instanceof Set) &&
  !(value instanceof Map) &&
  !(value instanceof Date) &&
  !(value instanceof Uint8Array);

const isSetField = (field: FieldDescriptor): boolean =>
  field.isCollection && field.collectionKind === "set";

const typeLabel = (field: FieldDescriptor): string =>
  field.isCollection ? `${field.collectionKind ?? "list"}<${field.scalarType}>` : field.scalarType;

const describeValue = (value: unknown): string => {
  if (value === null) return "null";
  if (value instanceof Date) return "Date";
  if (Array.isArray(value)) return "array";
  return typeof value;
};

const wrongValue = (field: FieldDescriptor, value: unknown, expected: string): Encoded =>
  err(
    createEncodeError(
      field.sourceName,
      typeLabel(field),
      value,
      `expected ${expected}, got ${describeValue(value)}`,
    ),
  );

const wrongNode = (field: FieldDescriptor, node: AttributeValue, expected: string): Decoded =>
  err(
    createDecodeError(
      field.sourceName,
      typeLabel(field),
      node,
      `expected ${expected}, got ${describeAttributeValue(node)}`,
    ),
  );

// ---------------------------------------------------------------------------
// Encoding
// ---------------------------------------------------------------------------

const encodeShape = (value: unknown, field: FieldDescriptor, shape: readonly FieldDescriptor[]): Encoded => {
  if (!isPlainObject(value)) return wrongValue(field, value, "an object");

  const entries: Record<string, AttributeValue> = {};
  for (const child of shape) {
    const childValue = readField(value, child.sourceName);
    if ((childValue === undefined || childValue === null) && !child.isNullable && !isSetField(child)) {
      return err(
        createEncodeError(
          `${field.sourceName}.${child.sourceName}`,
          typeLabel(child),
          childValue,
          "required value is missing",
        ),
      );
    }
    const encoded = encodeValue(childValue, child);
    if (!encoded.success) return err(nestConversionError(encoded.error, field.sourceName));
    if (encoded.data !== undefined) entries[child.storedName] = encoded.data;
  }
  return ok({ M: entries });
};

const encodeScalar = (value: unknown, field: FieldDescriptor): Encoded => {
  switch (field.scalarType) {
    case "string":
      return typeof value === "string" ? ok({ S: value }) : wrongValue(field, value, "a string");

    case "number": {
      if (typeof value === "bigint") return ok({ N: String(value) });
      if (typeof value !== "number" || !Number.isFinite(value)) {
        return wrongValue(field, value, "a finite number");
      }
      const text = formatNumber(value, field.format);
      return text.success
        ? ok({ N: text.data })
        : err(createEncodeError(field.sourceName, "number", value, text.error));
    }

    case "boolean":
      return typeof value === "boolean" ? ok({ BOOL: value }) : wrongValue(field, value, "a boolean");

    case "binary":
      return value instanceof Uint8Array ? ok({ B: value }) : wrongValue(field, value, "a Uint8Array");

    case "datetime": {
      if (!(value instanceof Date)) return wrongValue(field, value, "a Date");
      if (Number.isNaN(value.getTime())) {
        return err(createEncodeError(field.sourceName, "datetime", value, "invalid Date"));
      }
      const stored = formatDateTime(value, field.format, field.timeZone);
      return ok(stored.kind === "epoch" ? { N: stored.value } : { S: stored.value });
    }

    case "enum":
      if (typeof value !== "string") return wrongValue(field, value, "a string");
      return field.enumValues?.includes(value)
        ? ok({ S: value })
        : err(
            createEncodeError(
              field.sourceName,
              "enum",
              value,
              `"${value}" is not one of ${(field.enumValues ?? []).join(", ")}`,
            ),
          );

    case "nested": {
      if (field.shape) return encodeShape(value, field, field.shape);
      const marshalled = marshallValue(value);
      return marshalled.success
        ? ok(marshalled.data)
        : err(createEncodeError(field.sourceName, "nested", value, marshalled.error.message, marshalled.error));
    }
  }
};

/** Whether a scalar field's stored text is an `N` node rather than `S`. */
export const isNumericField = (field: FieldDescriptor): boolean =>
  field.scalarType === "number" ||
  (field.scalarType === "datetime" && isEpochFormat(field.format));

/** Set variant a field's elements are stored in. */
export const setVariant = (field: FieldDescriptor): "SS" | "NS" | "BS" | undefined => {
  switch (field.scalarType) {
    case "string":
    case "enum":
      return "SS";
    case "number":
      return "NS";
    case "binary":
      return "BS";
    case "datetime":
      return isEpochFormat(field.format) ? "NS" : "SS";
    default:
      return undefined;
  }
};

const encodeSet = (value: unknown, field: FieldDescriptor): Result<AttributeValue | undefined, ConversionError> => {
  const elements = value instanceof Set ? [...value] : Array.isArray(value) ? value : undefined;
  if (elements === undefined) return wrongValue(field, value, "a Set or an array");
  if (elements.length === 0) return ok(undefined);

  const variant = setVariant(field);
  const strings: string[] = [];
  const binaries: Uint8Array[] = [];
  for (const element of elements) {
    const encoded = encodeScalar(element, field);
    if (!encoded.success) return encoded;
    const node = encoded.data;
    if ("S" in node && variant === "SS") strings.push(node.S);
    else if ("N" in node && variant === "NS") strings.push(node.N);
    else if ("B" in node && variant === "BS") binaries.push(node.B);
    else return wrongValue(field, element, `a ${field.scalarType} set element`);
  }

  if (variant === "BS") return ok({ BS: binaries });
  const unique = [...new Set(strings)];
  return ok(variant === "NS" ? { NS: unique } : { SS: unique });
};

/**
 * Encodes a domain value for `field`.
 *
 * Returns `undefined` when the attribute should be omitted: an unset value
 * (unless the field is nullable with `storeNull`) or an empty set.
 *
 * @example
 * ```ts
 * encodeValue(12.5, priceField);          // { success: true, data: { N: "12.50" } } with format "F2"
 * encodeValue(undefined, nicknameField);  // { success: true, data: undefined }
 * ```
 */
export const encodeValue = (
  value: unknown,
  field: FieldDescriptor,
): Result<AttributeValue | undefined, ConversionError> => {
  if (value === undefined || value === null) {
    return ok(field.isNullable && field.storeNull ? { NULL: true } : undefined);
  }

  if (!field.isCollection) return encodeScalar(value, field);

  switch (field.collectionKind) {
    case "set":
      return encodeSet(value, field);

    case "map": {
      if (!isPlainObject(value)) return wrongValue(field, value, "an object");
      const entries: Record<string, AttributeValue> = {};
      for (const [key, element] of Object.entries(value)) {
        if (element === undefined) continue;
        const encoded = element === null ? ok<AttributeValue>({ NULL: true }) : encodeScalar(element, field);
        if (!encoded.success) return err(renameConversionField(encoded.error, `${field.sourceName}.${key}`));
        entries[key] = encoded.data;
      }
      return ok({ M: entries });
    }

    default: {
      if (!Array.isArray(value)) return wrongValue(field, value, "an array");
      const items: AttributeValue[] = [];
      for (const [i, element] of value.entries()) {
        const encoded =
          element === undefined || element === null ? ok<AttributeValue>({ NULL: true }) : encodeScalar(element, field);
        if (!encoded.success) return err(renameConversionField(encoded.error, `${field.sourceName}.${i}`));
        items.push(encoded.data);
      }
      return ok({ L: items });
    }
  }
};

// ---------------------------------------------------------------------------
// Decoding
// ---------------------------------------------------------------------------

const decodeShape = (node: AttributeValue, field: FieldDescriptor, shape: readonly FieldDescriptor[]): Decoded => {
  if (!("M" in node)) return wrongNode(field, node, "a Map");

  const out: Record<string, unknown> = {};
  for (const child of shape) {
    const childNode = node.M[child.storedName];
    if ((childNode === undefined || "NULL" in childNode) && !child.isNullable && !isSetField(child)) {
      return err(
        createDecodeError(
          `${field.sourceName}.${child.sourceName}`,
          typeLabel(child),
          childNode,
          "required attribute is missing",
        ),
      );
    }
    const decoded = decodeValue(childNode, child);
    if (!decoded.success) return err(nestConversionError(decoded.error, field.sourceName));
    if (decoded.data !== undefined) out[child.sourceName] = decoded.data;
  }
  return ok(out);
};

const decodeScalar = (node: AttributeValue, field: FieldDescriptor): Decoded => {
  switch (field.scalarType) {
    case "string":
      return "S" in node ? ok(node.S) : wrongNode(field, node, "a String");

    case "number": {
      if (!("N" in node)) return wrongNode(field, node, "a Number");
      const n = node.N.trim() === "" ? Number.NaN : Number(node.N);
      return Number.isNaN(n)
        ? err(createDecodeError(field.sourceName, "number", node, `"${node.N}" is not numeric`))
        : ok(n);
    }

    case "boolean":
      return "BOOL" in node ? ok(node.BOOL) : wrongNode(field, node, "a Boolean");

    case "binary":
      return "B" in node ? ok(node.B) : wrongNode(field, node, "a Binary");

    case "datetime": {
      const parsed =
        "N" in node
          ? parseEpoch(node.N, field.format)
          : "S" in node
            ? parseDateTimeText(node.S, field.format, field.timeZone)
            : undefined;
      if (parsed !== undefined) return ok(parsed);
      return "N" in node || "S" in node
        ? err(createDecodeError(field.sourceName, "datetime", node, `${describeAttributeValue(node)} is not a readable datetime`))
        : wrongNode(field, node, "a String or Number");
    }

    case "enum":
      if (!("S" in node)) return wrongNode(field, node, "a String");
      return field.enumValues?.includes(node.S)
        ? ok(node.S)
        : err(
            createDecodeError(
              field.sourceName,
              "enum",
              node,
              `"${node.S}" is not one of ${(field.enumValues ?? []).join(", ")}`,
            ),
          );

    case "nested": {
      if (field.shape) return decodeShape(node, field, field.shape);
      const unmarshalled = unmarshallValue(node);
      return unmarshalled.success
        ? ok(unmarshalled.data)
        : err(createDecodeError(field.sourceName, "nested", node, unmarshalled.error.message, unmarshalled.error));
    }
  }
};

const decodeSet = (node: AttributeValue, field: FieldDescriptor): Decoded => {
  const type = getAttributeValueType(node);
  if (type !== setVariant(field)) {
    return wrongNode(field, node, attributeTypeLabel(setVariant(field) ?? "SS"));
  }

  const elements: AttributeValue[] =
    "SS" in node
      ? node.SS.map((s) => ({ S: s }))
      : "NS" in node
        ? node.NS.map((n) => ({ N: n }))
        : "BS" in node
          ? node.BS.map((b) => ({ B: b }))
          : [];

  const out = new Set<unknown>();
  for (const element of elements) {
    const decoded = decodeScalar(element, field);
    if (!decoded.success) return decoded;
    out.add(decoded.data);
  }
  return ok(out);
};

/**
 * Decodes a stored node for `field`.
 *
 * `NULL` and an absent node both decode to `undefined`, except for sets,
 * which decode to an empty `Set`.
 *
 * @example
 * ```ts
 * decodeValue({ N: "12.50" }, priceField); // { success: true, data: 12.5 }
 * decodeValue({ S: "x" }, priceField);     // conversion error: expected a Number
 * ```
 */
export const decodeValue = (
  node: AttributeValue | undefined,
  field: FieldDescriptor,
): Result<unknown, ConversionError> => {
  if (node === undefined || "NULL" in node) {
    return ok(isSetField(field) ? new Set<unknown>() : undefined);
  }

  if (!field.isCollection) return decodeScalar(node, field);

  switch (field.collectionKind) {
    case "set":
      return decodeSet(node, field);

    case "map": {
      if (!("M" in node)) return wrongNode(field, node, "a Map");
      const out: Record<string, unknown> = {};
      for (const [key, element] of Object.entries(node.M)) {
        const decoded = "NULL" in element ? ok(null) : decodeScalar(element, field);
        if (!decoded.success) return err(renameConversionField(decoded.error, `${field.sourceName}.${key}`));
        out[key] = decoded.data;
      }
      return ok(out);
    }

    default: {
      if (!("L" in node)) return wrongNode(field, node, "a List");
      const items: unknown[] = [];
      for (const [i, element] of node.L.entries()) {
        const decoded = "NULL" in element ? ok(null) : decodeScalar(element, field);
        if (!decoded.success) return err(renameConversionField(decoded.error, `${field.sourceName}.${i}`));
        items.push(decoded.data);
      }
      return ok(items);
    }
  }
};

/**
 * Text of a value as it appears inside key strings: the stored `S` or `N`
 * text, or `"true"` / `"false"` for booleans.
 */
export const keyText = (
  value: unknown,
  field: FieldDescriptor,
): Result<string, ConversionError> => {
  const encoded = encodeScalar(value, field);
  if (!encoded.success) return encoded;
  const node = encoded.data;
  if ("S" in node) return ok(node.S);
  if ("N" in node) return ok(node.N);
  if ("BOOL" in node) return ok(String(node.BOOL));
  return err(
    createEncodeError(field.sourceName, "key text", value, `${describeAttributeValue(node)} cannot be part of a key`),
  );
};
