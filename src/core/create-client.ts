/**
 * Client factory: entity-scoped store operations over a record store adapter.
 */

import type { RecordStoreAdapter } from "../adapters/adapter.js";
import type { AttributeMap } from "../marshalling/types.js";
import { executeGet } from "../operations/get.js";
import { executePut } from "../operations/put.js";
import { executeQuery } from "../operations/query.js";
import type { Result } from "../types/common.js";
import type { MappingError } from "../types/errors.js";
import type {
  GetOptions,
  PutOptions,
  QueryOptions,
  ReconstructionResult,
} from "../types/operations.js";
import type { SchemaModel } from "../types/schema.js";
import { type MapperConfig, createMapper } from "./create-mapper.js";

/** Configuration for creating a client. */
export interface ClientConfig extends MapperConfig {
  readonly adapter: RecordStoreAdapter;
}

/**
 * Store and mapping operations scoped to one entity. Per-call options
 * override the client configuration.
 */
export interface EntityClient<T extends object> {
  readonly model: SchemaModel<T>;

  /** Maps and writes an entity; returns the written record. */
  readonly put: (entity: T, options?: PutOptions) => Promise<Result<AttributeMap, MappingError>>;

  /** Reads an entity by the fields its primary key derives from. */
  readonly get: (key: Partial<T>, options?: GetOptions) => Promise<Result<T | undefined, MappingError>>;

  /** Reads a partition and reconstructs the entity with its related records. */
  readonly query: (key: Partial<T>, options?: QueryOptions) => Promise<Result<ReconstructionResult<T>, MappingError>>;

  readonly toRecord: (entity: T) => Promise<Result<AttributeMap, MappingError>>;
  readonly fromRecord: (record: AttributeMap) => Promise<Result<T, MappingError>>;
  readonly reconstruct: (records: readonly AttributeMap[]) => Promise<Result<ReconstructionResult<T>, MappingError>>;
  readonly matches: (record: AttributeMap) => boolean;
}

/** The client: a factory of entity-scoped clients. */
export interface EntityMapperClient {
  readonly entity: <T extends object>(model: SchemaModel<T>) => EntityClient<T>;
}

/**
 * Creates a client bound to a record store adapter.
 *
 * @example
 * ```ts
 * import { DynamoDBClient, PutItemCommand, GetItemCommand, QueryCommand } from "@aws-sdk/client-dynamodb";
 *
 * const adapter = createSDKv3Adapter(new DynamoDBClient({}), { PutItemCommand, GetItemCommand, QueryCommand });
 * const client = createClient({ adapter, logger: createConsoleLogger() });
 * const orders = client.entity(orderModel);
 *
 * await orders.put(order);
 * const result = await orders.query({ orderId: "O1" });
 * ```
 */
export const createClient = (config: ClientConfig): EntityMapperClient => {
  const { adapter, ...mapperConfig } = config;
  const mapper = createMapper(mapperConfig);
  const defaults = mapper.config;

  const entity = <T extends object>(model: SchemaModel<T>): EntityClient<T> =>
    Object.freeze({
      model,
      put: (item: T, options?: PutOptions) => executePut(model, adapter, item, { ...defaults, ...options }),
      get: (key: Partial<T>, options?: GetOptions) => executeGet(model, adapter, key, { ...defaults, ...options }),
      query: (key: Partial<T>, options?: QueryOptions) => executeQuery(model, adapter, key, { ...defaults, ...options }),
      toRecord: (item: T) => mapper.toRecord(item, model),
      fromRecord: (record: AttributeMap) => mapper.fromRecord(record, model),
      reconstruct: (records: readonly AttributeMap[]) => mapper.reconstruct(records, model),
      matches: (record: AttributeMap) => mapper.matches(record, model),
    });

  return Object.freeze({ entity });
};
