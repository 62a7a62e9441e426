/**
 * Factory function for creating immutable table definitions.
 */

import type {
  TableConfig,
  TableDefinition,
  IndexDefinition,
} from "../types/table.js";

/**
 * Defines a table with its primary key attribute names and optional indexes.
 *
 * Key fields of every entity stored in the table default their stored
 * attribute name to these key names.
 *
 * @example
 * ```ts
 * const table = defineTable({
 *   tableName: "Orders",
 *   partitionKey: { name: "pk" },
 *   sortKey: { name: "sk" },
 *   indexes: {
 *     byStatus: {
 *       indexName: "GSI1",
 *       partitionKey: { name: "gsi1pk" },
 *       sortKey: { name: "gsi1sk" },
 *     },
 *   },
 * });
 * ```
 */
export const defineTable = <
  Indexes extends Record<string, IndexDefinition> = Record<string, never>,
>(
  config: TableConfig<Indexes>,
): TableDefinition<Indexes> => {
  const indexes: Record<string, IndexDefinition> = {};
  for (const [key, index] of Object.entries(config.indexes ?? {})) {
    indexes[key] = Object.freeze({
      indexName: index.indexName,
      partitionKey: Object.freeze({ ...index.partitionKey }),
      sortKey: index.sortKey ? Object.freeze({ ...index.sortKey }) : undefined,
    });
  }

  return Object.freeze({
    tableName: config.tableName,
    partitionKey: Object.freeze({ ...config.partitionKey }),
    sortKey: config.sortKey ? Object.freeze({ ...config.sortKey }) : undefined,
    // Same keys as `config.indexes`, each entry copied and frozen.
    indexes: Object.freeze(indexes) as Indexes,
  });
};
