/**
 * Memoised schema building, keyed by entity definition.
 */

import type { Result } from "../types/common.js";
import type { EntityDefinition } from "../types/entity.js";
import type { SchemaModel } from "../types/schema.js";
import type { SchemaBuildError } from "../validation/diagnostics.js";
import { type BuildSchemaOptions, buildSchemaModel } from "./build-schema.js";

/** A cache of built schema models. */
export interface SchemaCache {
  /** Builds `definition` on first use; later calls return the same result. */
  readonly get: <T extends object>(
    definition: EntityDefinition<T>,
  ) => Result<SchemaModel<T>, SchemaBuildError>;
  readonly has: (definition: EntityDefinition) => boolean;
}

/**
 * Creates a schema cache. Each definition is built at most once, failures
 * included, and entries go away with their definitions.
 *
 * @example
 * ```ts
 * const schemas = createSchemaCache();
 * const order = schemas.get(orderEntity);
 * schemas.get(orderEntity) === order; // true
 * ```
 */
export const createSchemaCache = (
  options: BuildSchemaOptions = {},
): SchemaCache => {
  const entries = new WeakMap<EntityDefinition, Result<SchemaModel, SchemaBuildError>>();

  const get = <T extends object>(
    definition: EntityDefinition<T>,
  ): Result<SchemaModel<T>, SchemaBuildError> => {
    const cached = entries.get(definition);
    // Entries are only ever stored under the definition they were built
    // from, so a hit carries that definition's type.
    if (cached !== undefined) return cached as Result<SchemaModel<T>, SchemaBuildError>;

    const built = buildSchemaModel(definition, options);
    entries.set(definition, built);
    return built;
  };

  return Object.freeze({
    get,
    has: (definition: EntityDefinition) => entries.has(definition),
  });
};
