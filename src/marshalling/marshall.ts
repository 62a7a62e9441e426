/**
 * Marshalls free-form JavaScript values into DynamoDB AttributeValue format.
 *
 * Used for `nested` fields that declare no shape.
 */

import { type Result, ok, err } from "../types/common.js";
import type { AttributeValue, AttributeMap } from "./types.js";

/**
 * Marshalls a single JavaScript value into a DynamoDB AttributeValue.
 *
 * Conversion rules:
 * - `null` / `undefined` -> `{ NULL: true }`
 * - `string` -> `{ S: "..." }`
 * - `number` / `bigint` -> `{ N: "..." }`
 * - `boolean` -> `{ BOOL: true/false }`
 * - `Uint8Array` -> `{ B: ... }`
 * - `Date` -> `{ S: "<ISO-8601>" }`
 * - `Set<string>` -> `{ SS: [...] }`
 * - `Set<number>` -> `{ NS: [...] }`
 * - `Set<Uint8Array>` -> `{ BS: [...] }`
 * - `Array` -> `{ L: [...] }`
 * - Plain object -> `{ M: { ... } }`
 */
export const marshallValue = (
  value: unknown,
): Result<AttributeValue, Error> => {
  if (value === null || value === undefined) {
    return ok({ NULL: true });
  }

  if (typeof value === "string") {
    return ok({ S: value });
  }

  if (typeof value === "number") {
    if (!Number.isFinite(value)) {
      return err(new Error(`Cannot marshall non-finite number: ${value}`));
    }
    return ok({ N: String(value) });
  }

  if (typeof value === "bigint") {
    return ok({ N: String(value) });
  }

  if (typeof value === "boolean") {
    return ok({ BOOL: value });
  }

  if (value instanceof Uint8Array) {
    return ok({ B: value });
  }

  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      return err(new Error("Cannot marshall an invalid Date"));
    }
    return ok({ S: value.toISOString() });
  }

  if (value instanceof Set) {
    return marshallSet(value);
  }

  if (Array.isArray(value)) {
    return marshallList(value);
  }

  if (typeof value === "object") {
    return marshallMap(Object.entries(value));
  }

  return err(new Error(`Cannot marshall value of type ${typeof value}`));
};

const marshallSet = (
  set: ReadonlySet<unknown>,
): Result<AttributeValue, Error> => {
  if (set.size === 0) {
    return err(new Error("Cannot marshall empty Set; DynamoDB does not support empty sets"));
  }

  const strings: string[] = [];
  const numbers: string[] = [];
  const binaries: Uint8Array[] = [];

  for (const v of set) {
    if (typeof v === "string") strings.push(v);
    else if (typeof v === "number" || typeof v === "bigint") numbers.push(String(v));
    else if (v instanceof Uint8Array) binaries.push(v);
    else {
      return err(
        new Error(
          `Cannot marshall Set with element type ${typeof v}; only string, number, and Uint8Array sets are supported`,
        ),
      );
    }
  }

  if (strings.length === set.size) return ok({ SS: strings });
  if (numbers.length === set.size) return ok({ NS: numbers });
  if (binaries.length === set.size) return ok({ BS: binaries });
  return err(new Error("Cannot marshall Set with mixed element types"));
};

const marshallList = (
  list: readonly unknown[],
): Result<AttributeValue, Error> => {
  const items: AttributeValue[] = [];
  for (const item of list) {
    const result = marshallValue(item);
    if (!result.success) return result;
    items.push(result.data);
  }
  return ok({ L: items });
};

const marshallMap = (
  entries: ReadonlyArray<readonly [string, unknown]>,
): Result<AttributeValue, Error> => {
  const map: Record<string, AttributeValue> = {};
  for (const [key, value] of entries) {
    if (value === undefined) continue;
    const result = marshallValue(value);
    if (!result.success) return result;
    map[key] = result.data;
  }
  return ok({ M: map });
};

/**
 * Marshalls a plain JavaScript object into a raw record. Undefined attributes
 * are skipped.
 */
export const marshallItem = (
  item: Readonly<Record<string, unknown>>,
): Result<AttributeMap, Error> => {
  const result = marshallMap(Object.entries(item));
  if (!result.success) return result;
  return "M" in result.data ? ok(result.data.M) : ok({});
};
