/**
 * DynamoDB AttributeValue types.
 *
 * These mirror the AWS SDK shapes but are defined locally so that the mapper
 * has no runtime dependency on the AWS SDK.
 */

/** A DynamoDB AttributeValue: exactly one variant is populated. */
export type AttributeValue =
  | { readonly S: string }
  | { readonly N: string }
  | { readonly B: Uint8Array }
  | { readonly SS: readonly string[] }
  | { readonly NS: readonly string[] }
  | { readonly BS: readonly Uint8Array[] }
  | { readonly L: readonly AttributeValue[] }
  | { readonly M: Readonly<Record<string, AttributeValue>> }
  | { readonly NULL: true }
  | { readonly BOOL: boolean };

/** A raw record: attribute name to AttributeValue. */
export type AttributeMap = Readonly<Record<string, AttributeValue>>;

/** Identifies which DynamoDB type tag an AttributeValue carries. */
export type AttributeValueType =
  | "S"
  | "N"
  | "B"
  | "SS"
  | "NS"
  | "BS"
  | "L"
  | "M"
  | "NULL"
  | "BOOL";

/**
 * Returns the DynamoDB type tag of an AttributeValue.
 *
 * @returns The type tag, or undefined if the value has no recognized tag.
 */
export const getAttributeValueType = (
  av: AttributeValue,
): AttributeValueType | undefined => {
  if ("S" in av) return "S";
  if ("N" in av) return "N";
  if ("B" in av) return "B";
  if ("SS" in av) return "SS";
  if ("NS" in av) return "NS";
  if ("BS" in av) return "BS";
  if ("L" in av) return "L";
  if ("M" in av) return "M";
  if ("NULL" in av) return "NULL";
  if ("BOOL" in av) return "BOOL";
  return undefined;
};

const TYPE_LABELS: Readonly<Record<AttributeValueType, string>> = {
  S: "String",
  N: "Number",
  B: "Binary",
  SS: "StringSet",
  NS: "NumberSet",
  BS: "BinarySet",
  L: "List",
  M: "Map",
  NULL: "Null",
  BOOL: "Boolean",
};

/**
 * Short, log-safe description of an AttributeValue, e.g. `Map(3 attributes)`
 * or `String("abc")`. Binary payloads are summarised by length only.
 */
export const describeAttributeValue = (av: AttributeValue): string => {
  if ("S" in av) return `String(${JSON.stringify(av.S)})`;
  if ("N" in av) return `Number(${av.N})`;
  if ("B" in av) return `Binary(${av.B.length} bytes)`;
  if ("SS" in av) return `StringSet(${av.SS.length} items)`;
  if ("NS" in av) return `NumberSet(${av.NS.length} items)`;
  if ("BS" in av) return `BinarySet(${av.BS.length} items)`;
  if ("L" in av) return `List(${av.L.length} items)`;
  if ("M" in av) return `Map(${Object.keys(av.M).length} attributes)`;
  if ("NULL" in av) return "Null";
  if ("BOOL" in av) return `Boolean(${av.BOOL})`;
  return "Unknown";
};

/** Human-readable label of a type tag (`"M"` -> `"Map"`). */
export const attributeTypeLabel = (type: AttributeValueType): string =>
  TYPE_LABELS[type];

/**
 * Reads the textual payload of a scalar key-like value (`S` or `N`).
 * Returns undefined for every other variant.
 */
export const scalarText = (
  av: AttributeValue | undefined,
): string | undefined => {
  if (av === undefined) return undefined;
  if ("S" in av) return av.S;
  if ("N" in av) return av.N;
  return undefined;
};
