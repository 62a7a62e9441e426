/**
 * Computes derived key values from domain objects.
 */

import { encodeValue, keyText, readField } from "../codec/value-codec.js";
import type { AttributeMap, AttributeValue } from "../marshalling/types.js";
import { type Result, ok, err } from "../types/common.js";
import {
  type ConversionError,
  type IncompleteKeyError,
  createIncompleteKeyError,
} from "../types/errors.js";
import type { FieldDescriptor, SchemaModel } from "../types/schema.js";
import type { ParsedTemplate } from "./template-parser.js";

/**
 * Builds a key value string from a parsed template.
 *
 * @returns The built string, or the name of the first placeholder with no value.
 *
 * @example
 * ```ts
 * const tmpl = parseTemplate("ORDER#{{orderId}}");
 * buildKeyValue(tmpl, { orderId: "123" });
 * // => { success: true, data: "ORDER#123" }
 * ```
 */
export const buildKeyValue = (
  template: ParsedTemplate,
  data: Readonly<Record<string, unknown>>,
): Result<string, string> => {
  const parts: string[] = [];

  for (const segment of template.segments) {
    if (segment.type === "literal") {
      parts.push(segment.value);
    } else {
      const value = data[segment.name];
      if (value === undefined || value === null) return err(segment.name);
      parts.push(String(value));
    }
  }

  return ok(parts.join(""));
};

type KeyError = ConversionError | IncompleteKeyError;

/**
 * Computes one derived field from the current values of its sources.
 *
 * Each source is rendered with its own codec (so formats apply), then the
 * texts are joined with the separator or substituted into the template.
 * A nullable derived field whose sources are all unset stays unset.
 *
 * @example
 * ```ts
 * // pk derived from ["tenantId", "customerId"]
 * computeDerived({ tenantId: "T1", customerId: "C1" }, pkField);
 * // => { success: true, data: "T1#C1" }
 * computeDerived({ tenantId: "T1" }, pkField);
 * // => incompleteKey error naming "customerId"
 * ```
 */
export const computeDerived = (
  source: object,
  field: FieldDescriptor,
): Result<string | undefined, KeyError> => {
  const rule = field.derivedFrom;
  if (rule === undefined) return ok(undefined);

  const texts: Record<string, string> = {};
  const parts: string[] = [];
  let missing: string | undefined;

  for (const sourceField of rule.sources) {
    const value = readField(source, sourceField.sourceName);
    if (value === undefined || value === null) {
      missing ??= sourceField.sourceName;
      continue;
    }
    const text = keyText(value, sourceField);
    if (!text.success) return text;
    texts[sourceField.sourceName] = text.data;
    parts.push(text.data);
  }

  if (missing !== undefined) {
    return field.isNullable && parts.length === 0
      ? ok(undefined)
      : err(createIncompleteKeyError(field.sourceName, missing));
  }

  if (rule.template === undefined) return ok(parts.join(rule.separator));

  const built = buildKeyValue(rule.template, texts);
  return built.success
    ? ok(built.data)
    : err(createIncompleteKeyError(field.sourceName, built.error));
};

const runDerivations = (
  source: object,
  fields: readonly FieldDescriptor[],
): Result<Record<string, unknown>, KeyError> => {
  const working: Record<string, unknown> = { ...source };
  for (const field of fields) {
    const computed = computeDerived(working, field);
    if (!computed.success) return computed;
    if (computed.data !== undefined) working[field.sourceName] = computed.data;
  }
  return ok(working);
};

/**
 * Computes every derived field of `model`, sources before dependents, on a
 * shallow copy of `source`. The input object is never modified.
 */
export const applyDerivedKeys = (
  source: object,
  model: SchemaModel,
): Result<Record<string, unknown>, KeyError> =>
  runDerivations(source, model.derivedOrder);

/** Derived fields the given key fields depend on, including themselves. */
const derivationClosure = (model: SchemaModel, roots: readonly FieldDescriptor[]): readonly FieldDescriptor[] => {
  const needed = new Set<string>();
  const visit = (field: FieldDescriptor): void => {
    if (needed.has(field.sourceName)) return;
    needed.add(field.sourceName);
    for (const source of field.derivedFrom?.sources ?? []) {
      const full = model.fields.find((f) => f.sourceName === source.sourceName);
      if (full) visit(full);
    }
  };
  for (const root of roots) visit(root);
  return model.derivedOrder.filter((f) => needed.has(f.sourceName));
};

const computeKeyNodes = (
  source: object,
  model: SchemaModel,
  fields: readonly FieldDescriptor[],
): Result<readonly (readonly [FieldDescriptor, AttributeValue])[], KeyError> => {
  const derived = runDerivations(source, derivationClosure(model, fields));
  if (!derived.success) return derived;

  const nodes: (readonly [FieldDescriptor, AttributeValue])[] = [];
  for (const field of fields) {
    const encoded = encodeValue(derived.data[field.sourceName], field);
    if (!encoded.success) return encoded;
    if (encoded.data === undefined) {
      return err(createIncompleteKeyError(field.sourceName, field.sourceName));
    }
    nodes.push([field, encoded.data]);
  }
  return ok(nodes);
};

/**
 * Builds the stored primary key attributes from a partial object, computing
 * only the derivations the keys need.
 *
 * @example
 * ```ts
 * computeKeyAttributes({ tenantId: "T1", customerId: "C1" }, customerModel);
 * // => { success: true, data: { pk: { S: "T1#C1" }, sk: { S: "PROFILE" } } }
 * ```
 */
export const computeKeyAttributes = (
  source: object,
  model: SchemaModel,
): Result<AttributeMap, KeyError> => {
  const fields = model.sortKey ? [model.partitionKey, model.sortKey] : [model.partitionKey];
  const nodes = computeKeyNodes(source, model, fields);
  if (!nodes.success) return nodes;
  return ok(Object.freeze(Object.fromEntries(nodes.data.map(([f, node]) => [f.storedName, node]))));
};

/** Builds the stored partition key value alone from a partial object. */
export const computePartitionKeyValue = (
  source: object,
  model: SchemaModel,
): Result<AttributeValue, KeyError> => {
  const nodes = computeKeyNodes(source, model, [model.partitionKey]);
  if (!nodes.success) return nodes;
  const [entry] = nodes.data;
  return entry
    ? ok(entry[1])
    : err(createIncompleteKeyError(model.partitionKey.sourceName, model.partitionKey.sourceName));
};
