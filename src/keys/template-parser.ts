/**
 * Parsing of `{{field}}` key templates such as `"TENANT#{{tenantId}}"` into
 * literal segments and field references.
 */

/** A literal text segment in a parsed template. */
export interface LiteralSegment {
  readonly type: "literal";
  readonly value: string;
}

/** A field reference segment (`{{fieldName}}`) in a parsed template. */
export interface FieldSegment {
  readonly type: "field";
  readonly name: string;
}

export type TemplateSegment = LiteralSegment | FieldSegment;

/** A parsed template, used to build derived keys and to extract components. */
export interface ParsedTemplate {
  readonly segments: readonly TemplateSegment[];
  readonly fields: readonly string[];
}

const TEMPLATE_PATTERN = /\{\{(\w+)\}\}/g;

/**
 * Parses a key definition string into segments and field references.
 *
 * A string without placeholders parses to a single literal segment, which
 * is how constant keys such as `"META"` are expressed.
 *
 * @example
 * ```ts
 * parseTemplate("ORDER#{{orderId}}")
 * // => { segments: [{ type: "literal", value: "ORDER#" }, { type: "field", name: "orderId" }],
 * //      fields: ["orderId"] }
 *
 * parseTemplate("META")
 * // => { segments: [{ type: "literal", value: "META" }],
 * //      fields: [] }
 * ```
 */
export const parseTemplate = (definition: string): ParsedTemplate => {
  const segments: TemplateSegment[] = [];
  const fields: string[] = [];
  let cursor = 0;

  const literal = (end: number): void => {
    if (end > cursor) {
      segments.push(Object.freeze({ type: "literal" as const, value: definition.slice(cursor, end) }));
    }
  };

  for (const match of definition.matchAll(TEMPLATE_PATTERN)) {
    const name = match[1] ?? "";
    const start = match.index ?? cursor;
    literal(start);
    segments.push(Object.freeze({ type: "field" as const, name }));
    fields.push(name);
    cursor = start + match[0].length;
  }
  literal(definition.length);

  return Object.freeze({
    segments: Object.freeze(segments),
    fields: Object.freeze(fields),
  });
};
