/**
 * Record store adapter: the raw item operations the entity client needs,
 * abstracted over DynamoDB client implementations.
 *
 * An adapter is a record of functions (not a class). Items travel in raw
 * AttributeValue form; the mapper does all conversion.
 */

import type { AttributeMap } from "../marshalling/types.js";

/** Common input of every store operation. */
export interface BaseOperationInput {
  readonly tableName: string;
}

/** Input for PutItem. */
export interface PutItemInput extends BaseOperationInput {
  readonly item: AttributeMap;
  readonly conditionExpression?: string | undefined;
  readonly expressionAttributeNames?: Readonly<Record<string, string>> | undefined;
}

/** Input for GetItem. */
export interface GetItemInput extends BaseOperationInput {
  readonly key: AttributeMap;
  readonly consistentRead?: boolean | undefined;
}

/** Output for GetItem. */
export interface GetItemOutput {
  readonly item?: AttributeMap | undefined;
}

/** Input for a single Query page. */
export interface QueryInput extends BaseOperationInput {
  readonly keyConditionExpression: string;
  readonly expressionAttributeNames: Readonly<Record<string, string>>;
  readonly expressionAttributeValues: AttributeMap;
  readonly exclusiveStartKey?: AttributeMap | undefined;
  readonly consistentRead?: boolean | undefined;
  readonly limit?: number | undefined;
}

/** Output for a single Query page. */
export interface QueryOutput {
  readonly items: readonly AttributeMap[];
  readonly lastEvaluatedKey?: AttributeMap | undefined;
}

/**
 * The store operations the entity client calls. Implementations may throw;
 * operations turn thrown errors into `store` errors.
 */
export interface RecordStoreAdapter {
  readonly putItem: (input: PutItemInput) => Promise<void>;
  readonly getItem: (input: GetItemInput) => Promise<GetItemOutput>;
  readonly query: (input: QueryInput) => Promise<QueryOutput>;
}
