/**
 * Typed iteration over the field and relationship maps of an entity definition.
 */

import type {
  EntityDefinition,
  FieldConfig,
  RelationshipConfig,
} from "../types/entity.js";

const isFieldConfig = (value: unknown): value is FieldConfig =>
  typeof value === "object" && value !== null && "type" in value;

const isRelationshipConfig = (
  value: unknown,
): value is RelationshipConfig<object> =>
  typeof value === "object" &&
  value !== null &&
  "sortKeyPattern" in value &&
  "target" in value;

/** Declared fields in declaration order, skipping `undefined` entries. */
export const fieldEntries = (
  fields: object,
): readonly (readonly [string, FieldConfig])[] => {
  const entries: [string, unknown][] = Object.entries(fields);
  return entries.flatMap(([name, config]) =>
    isFieldConfig(config) ? [[name, config] as const] : [],
  );
};

/** Declared relationships in declaration order. */
export const relationshipEntries = (
  definition: EntityDefinition,
): readonly (readonly [string, RelationshipConfig<object>])[] => {
  const entries: [string, unknown][] = Object.entries(
    definition.relationships ?? {},
  );
  return entries.flatMap(([name, config]) =>
    isRelationshipConfig(config) ? [[name, config] as const] : [],
  );
};

/**
 * The definitions reachable from `roots` through relationship targets,
 * roots first, each once.
 */
export const collectDefinitions = (
  roots: readonly EntityDefinition[],
): readonly EntityDefinition[] => {
  const seen = new Set<EntityDefinition>();
  const out: EntityDefinition[] = [];
  const queue = [...roots];

  for (let next = queue.shift(); next !== undefined; next = queue.shift()) {
    if (seen.has(next)) continue;
    seen.add(next);
    out.push(next);
    for (const [, relationship] of relationshipEntries(next)) {
      queue.push(relationship.target);
    }
  }
  return out;
};
