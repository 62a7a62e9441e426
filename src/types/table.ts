/**
 * Table and index definition types for tables that hold one or more entity
 * shapes.
 */

/** DynamoDB key attribute type. */
export type KeyAttributeType = "S" | "N" | "B";

/** A single key attribute in a table or index. */
export interface KeyAttribute {
  readonly name: string;
  readonly type?: KeyAttributeType | undefined;
}

/** Definition for a Global Secondary Index. */
export interface IndexDefinition {
  readonly indexName: string;
  readonly partitionKey: KeyAttribute;
  readonly sortKey?: KeyAttribute | undefined;
}

/** Configuration input for `defineTable()`. */
export interface TableConfig<
  Indexes extends Record<string, IndexDefinition> = Record<
    string,
    IndexDefinition
  >,
> {
  readonly tableName: string;
  readonly partitionKey: KeyAttribute;
  readonly sortKey?: KeyAttribute | undefined;
  readonly indexes?: Indexes | undefined;
}

/** The frozen, immutable table definition produced by `defineTable()`. */
export interface TableDefinition<
  Indexes extends Record<string, IndexDefinition> = Record<
    string,
    IndexDefinition
  >,
> {
  readonly tableName: string;
  readonly partitionKey: KeyAttribute;
  readonly sortKey?: KeyAttribute | undefined;
  readonly indexes: Indexes;
}
