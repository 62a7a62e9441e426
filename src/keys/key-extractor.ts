/**
 * Recovers extracted fields from the key values they are embedded in.
 */

import { decodeValue, isNumericField } from "../codec/value-codec.js";
import type { AttributeValue } from "../marshalling/types.js";
import { type Result, ok, err } from "../types/common.js";
import {
  type ConversionError,
  type KeyExtractionError,
  createKeyExtractionError,
} from "../types/errors.js";
import type { ExtractionPolicy } from "../types/entity.js";
import { type MappingLogger, silentLogger } from "../types/logger.js";
import type { FieldDescriptor } from "../types/schema.js";
import type { ParsedTemplate } from "./template-parser.js";

/**
 * Extracts field values from a key string using a parsed template, using the
 * literal segments as delimiters.
 *
 * @returns The extracted values, or a description of where the key stops
 *   matching the template.
 *
 * @example
 * ```ts
 * const tmpl = parseTemplate("TENANT#{{tenantId}}#CUSTOMER#{{customerId}}");
 * extractFieldsFromKey(tmpl, "TENANT#T1#CUSTOMER#C1");
 * // => { success: true, data: { tenantId: "T1", customerId: "C1" } }
 * ```
 */
export const extractFieldsFromKey = (
  template: ParsedTemplate,
  keyValue: string,
): Result<Readonly<Record<string, string>>, string> => {
  const fields: Record<string, string> = {};
  let position = 0;

  for (const [i, segment] of template.segments.entries()) {
    if (segment.type === "literal") {
      if (!keyValue.startsWith(segment.value, position)) {
        return err(`expected "${segment.value}" at position ${position}`);
      }
      position += segment.value.length;
      continue;
    }

    const next = template.segments[i + 1];
    if (next === undefined) {
      fields[segment.name] = keyValue.slice(position);
      position = keyValue.length;
    } else if (next.type === "literal") {
      const end = keyValue.indexOf(next.value, position);
      if (end === -1) return err(`delimiter "${next.value}" not found`);
      fields[segment.name] = keyValue.slice(position, end);
      position = end;
    } else {
      return err("consecutive placeholders have no delimiter");
    }
  }

  return ok(Object.freeze(fields));
};

/** Context for `extractComponents()`. */
export interface ExtractionOptions {
  readonly policy?: ExtractionPolicy | undefined;
  readonly logger?: MappingLogger | undefined;
  readonly entityId?: string | undefined;
}

const sourceText = (value: unknown): string | undefined =>
  typeof value === "string" ? value : typeof value === "number" ? String(value) : undefined;

const locateComponent = (
  field: FieldDescriptor,
  text: string,
): string | undefined => {
  const rule = field.extractedFrom;
  if (rule === undefined) return undefined;
  if (rule.kind === "position") {
    return text.split(rule.separator)[rule.index];
  }
  const extracted = extractFieldsFromKey(rule.template, text);
  return extracted.success ? extracted.data[field.sourceName] : undefined;
};

/**
 * Assigns an extracted field on `target` from the current value of its
 * source field.
 *
 * The component text is decoded with the field's own codec, so a numeric
 * extracted field receives a number. When the source is unset or the
 * component is absent or empty, the field stays unset under the `lenient`
 * policy (logged at warn when the source had a value) and the call fails
 * under `strict`.
 *
 * @example
 * ```ts
 * const target: Record<string, unknown> = { pk: "T1#C1" };
 * extractComponents(target, customerIdField); // target.customerId === "C1"
 * ```
 */
export const extractComponents = (
  target: Record<string, unknown>,
  field: FieldDescriptor,
  options: ExtractionOptions = {},
): Result<unknown, KeyExtractionError | ConversionError> => {
  const rule = field.extractedFrom;
  if (rule === undefined) return ok(undefined);

  const policy = rule.policy ?? options.policy ?? "lenient";
  const logger = options.logger ?? silentLogger;
  const index = rule.kind === "position" ? rule.index : -1;
  const text = sourceText(target[rule.source.sourceName]);
  const component = text === undefined ? undefined : locateComponent(field, text);

  if (component === undefined || component === "") {
    if (policy === "strict" && !(text === undefined && field.isNullable)) {
      return err(createKeyExtractionError(field.sourceName, rule.source.sourceName, index, text));
    }
    const context = { entityId: options.entityId, field: field.sourceName, source: rule.source.sourceName, value: text };
    if (text === undefined) {
      logger.debug("Extracted key source is unset", context);
    } else {
      logger.warn("Extracted key component is missing; leaving field unset", context);
    }
    return ok(undefined);
  }

  const node: AttributeValue = isNumericField(field) ? { N: component } : { S: component };
  const decoded = decodeValue(node, field);
  if (!decoded.success) return decoded;
  target[field.sourceName] = decoded.data;
  return ok(decoded.data);
};
