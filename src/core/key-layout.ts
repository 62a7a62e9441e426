/**
 * Resolution of a field's key role and stored attribute name against its table.
 */

import type { FieldConfig } from "../types/entity.js";
import type { KeyRole } from "../types/schema.js";
import type { IndexDefinition, KeyAttributeType, TableDefinition } from "../types/table.js";

/** A field's key role with the table or index attribute it maps to. */
export interface ResolvedKeyRole {
  readonly role: KeyRole;
  readonly indexName: string | undefined;
  /** Attribute the table (or index) declares for this role; undefined when there is none. */
  readonly keyAttribute: string | undefined;
  /** Declared type of that attribute, when the table gives one. */
  readonly keyType: KeyAttributeType | undefined;
}

/** Looks an index up by its key in `indexes` or by its `indexName`. */
export const findIndex = (
  table: TableDefinition,
  name: string,
): IndexDefinition | undefined =>
  table.indexes[name] ??
  Object.values(table.indexes).find((index) => index.indexName === name);

/** Resolves the key role a field config declares. */
export const resolveKeyRole = (
  config: FieldConfig,
  table: TableDefinition,
): ResolvedKeyRole => {
  const key = config.key;
  if (key === undefined) {
    return { role: "none", indexName: undefined, keyAttribute: undefined, keyType: undefined };
  }
  if (key === "partition") {
    return {
      role: "partition",
      indexName: undefined,
      keyAttribute: table.partitionKey.name,
      keyType: table.partitionKey.type,
    };
  }
  if (key === "sort") {
    return {
      role: "sort",
      indexName: undefined,
      keyAttribute: table.sortKey?.name,
      keyType: table.sortKey?.type,
    };
  }

  const index = findIndex(table, key.index);
  const attribute = key.role === "partition" ? index?.partitionKey : index?.sortKey;
  return {
    role: key.role === "partition" ? "gsiPartition" : "gsiSort",
    indexName: index?.indexName ?? key.index,
    keyAttribute: attribute?.name,
    keyType: attribute?.type,
  };
};

/**
 * Stored attribute name of a field: its explicit `attributeName`, else the
 * key attribute its role maps to, else the field name.
 */
export const resolveStoredName = (
  name: string,
  config: FieldConfig,
  table: TableDefinition,
): string =>
  config.attributeName ?? resolveKeyRole(config, table).keyAttribute ?? name;
