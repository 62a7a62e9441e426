/**
 * Unmarshalls DynamoDB AttributeValue format back into free-form JavaScript
 * values.
 */

import { type Result, ok, err } from "../types/common.js";
import type { AttributeValue, AttributeMap } from "./types.js";

/**
 * Unmarshalls a single DynamoDB AttributeValue into a JavaScript value.
 *
 * Conversion rules:
 * - `{ S: "..." }` -> `string`
 * - `{ N: "..." }` -> `number`
 * - `{ B: ... }` -> `Uint8Array`
 * - `{ SS: [...] }` -> `Set<string>`
 * - `{ NS: [...] }` -> `Set<number>`
 * - `{ BS: [...] }` -> `Set<Uint8Array>`
 * - `{ L: [...] }` -> `unknown[]`
 * - `{ M: { ... } }` -> `Record<string, unknown>`
 * - `{ NULL: true }` -> `null`
 * - `{ BOOL: ... }` -> `boolean`
 */
export const unmarshallValue = (
  av: AttributeValue,
): Result<unknown, Error> => {
  if ("S" in av) return ok(av.S);
  if ("N" in av) return ok(Number(av.N));
  if ("B" in av) return ok(av.B);
  if ("SS" in av) return ok(new Set(av.SS));
  if ("NS" in av) return ok(new Set(av.NS.map(Number)));
  if ("BS" in av) return ok(new Set(av.BS));
  if ("L" in av) {
    const items: unknown[] = [];
    for (const item of av.L) {
      const result = unmarshallValue(item);
      if (!result.success) return result;
      items.push(result.data);
    }
    return ok(items);
  }
  if ("M" in av) return unmarshallItem(av.M);
  if ("NULL" in av) return ok(null);
  if ("BOOL" in av) return ok(av.BOOL);
  return err(new Error("Unrecognized AttributeValue type"));
};

/**
 * Unmarshalls a raw record into a plain JavaScript object.
 */
export const unmarshallItem = (
  item: AttributeMap,
): Result<Record<string, unknown>, Error> => {
  const obj: Record<string, unknown> = {};
  for (const [key, av] of Object.entries(item)) {
    const result = unmarshallValue(av);
    if (!result.success) return result;
    obj[key] = result.data;
  }
  return ok(obj);
};
