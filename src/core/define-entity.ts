/**
 * Factory function for creating immutable entity definitions.
 */

import type { EntityConfig, EntityDefinition } from "../types/entity.js";

/**
 * Defines an entity shape: its fields, key roles, derived and extracted keys,
 * relationships and discriminator.
 *
 * Definitions are plain data. Nothing is validated here; `buildSchema()` or
 * `buildSchemaModel()` checks them and compiles the mapping plan.
 *
 * @example
 * ```ts
 * const customerEntity = defineEntity<Customer>({
 *   name: "Customer",
 *   table,
 *   fields: {
 *     tenantId: { type: "string", extractedFrom: { source: "pk", index: 0 } },
 *     customerId: { type: "string", extractedFrom: { source: "pk", index: 1 } },
 *     pk: { type: "string", key: "partition", derivedFrom: { sources: ["tenantId", "customerId"] } },
 *     sk: { type: "string", key: "sort", derivedFrom: { sources: [], template: "PROFILE" } },
 *     name: { type: "string" },
 *   },
 *   discriminator: { sortKey: "PROFILE" },
 * });
 * ```
 */
export const defineEntity = <T extends object>(
  config: EntityConfig<T>,
): EntityDefinition<T> =>
  Object.freeze({
    name: config.name,
    table: config.table,
    fields: Object.freeze({ ...config.fields }),
    relationships: config.relationships
      ? Object.freeze({ ...config.relationships })
      : undefined,
    discriminator: config.discriminator
      ? Object.freeze({ ...config.discriminator })
      : undefined,
    schema: config.schema,
  });
