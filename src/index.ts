/**
 * dynamo-entity-mapper: maps typed domain objects to DynamoDB records and
 * back, including derived and extracted keys, several entity shapes per
 * table and entities spread over several records of one partition.
 *
 * @example
 * ```ts
 * import { defineTable, defineEntity, buildSchemaModel, toRecord, reconstruct } from "dynamo-entity-mapper";
 *
 * const table = defineTable({ tableName: "Orders", partitionKey: { name: "pk" }, sortKey: { name: "sk" } });
 *
 * const lineEntity = defineEntity<LineItem>({
 *   name: "LineItem",
 *   table,
 *   fields: {
 *     pk: { type: "string", key: "partition" },
 *     sk: { type: "string", key: "sort" },
 *     sku: { type: "string" },
 *     quantity: { type: "number" },
 *   },
 *   discriminator: { sortKey: "LINE#*" },
 * });
 *
 * const orderEntity = defineEntity<Order>({
 *   name: "Order",
 *   table,
 *   fields: {
 *     orderId: { type: "string", extractedFrom: { source: "pk", template: "ORDER#{{orderId}}" } },
 *     pk: { type: "string", key: "partition", derivedFrom: { sources: ["orderId"], template: "ORDER#{{orderId}}" } },
 *     sk: { type: "string", key: "sort", derivedFrom: { sources: [], template: "META" } },
 *     placedAt: { type: "datetime" },
 *   },
 *   relationships: { lines: { sortKeyPattern: "LINE#*", target: lineEntity, collection: true } },
 *   discriminator: { sortKey: "META" },
 * });
 *
 * const built = buildSchemaModel(orderEntity);
 * if (!built.success) throw new Error(built.error.message);
 * const record = await toRecord(order, built.data);
 * const rebuilt = await reconstruct(items, built.data);
 * if (rebuilt.success) console.log(rebuilt.data.entities[0]?.lines);
 * ```
 */

// Definitions and schema building
export { defineTable } from "./core/define-table.js";
export { defineEntity } from "./core/define-entity.js";
export { buildSchema, buildSchemaModel, type BuildSchemaOptions, type SchemaRegistry } from "./core/build-schema.js";
export { createSchemaCache, type SchemaCache } from "./core/schema-cache.js";
export { createMapper, type Mapper, type MapperConfig } from "./core/create-mapper.js";
export { createClient, type ClientConfig, type EntityClient, type EntityMapperClient } from "./core/create-client.js";

// Definition and model types
export type { TableConfig, TableDefinition, IndexDefinition, KeyAttribute, KeyAttributeType } from "./types/table.js";
export type {
  CollectionKind,
  DerivedKeyConfig,
  DiscriminatorConfig,
  EntityConfig,
  EntityDefinition,
  ExtractedKeyConfig,
  ExtractionPolicy,
  FieldConfig,
  FieldConfigMap,
  KeyRoleConfig,
  RelationshipConfig,
  RelationshipConfigMap,
  ScalarType,
} from "./types/entity.js";
export type {
  AttributeRule,
  DerivedKeyRule,
  DiscriminatorRule,
  ExtractedKeyRule,
  FieldDescriptor,
  KeyRole,
  RelationshipDescriptor,
  SchemaModel,
} from "./types/schema.js";

// Mapping
export { encodeValue, decodeValue } from "./codec/value-codec.js";
export { DEFAULT_DATETIME_FORMAT, DEFAULT_TIME_ZONE } from "./codec/formats.js";
export { toRecord, fromRecord, fromMatchingRecord } from "./mapping/record-mapper.js";
export { computeDerived, applyDerivedKeys, computeKeyAttributes, buildKeyValue } from "./keys/key-builder.js";
export { extractComponents, extractFieldsFromKey, type ExtractionOptions } from "./keys/key-extractor.js";
export { parseTemplate, type ParsedTemplate, type TemplateSegment } from "./keys/template-parser.js";
export { matches, matchTier, resolveShape, type MatchTier, type ShapeResolution } from "./discrimination/entity-discriminator.js";
export { compileMatcher, matchValue, type MatchStrategy, type ValueMatcher } from "./discrimination/value-matcher.js";
export { reconstruct } from "./reconstruction/reconstruct.js";

// Store operations and adapters
export { executePut } from "./operations/put.js";
export { executeGet } from "./operations/get.js";
export { executeQuery, queryPartition } from "./operations/query.js";
export type {
  RecordStoreAdapter,
  PutItemInput,
  GetItemInput,
  GetItemOutput,
  QueryInput,
  QueryOutput,
} from "./adapters/adapter.js";
export { createSDKv3Adapter } from "./adapters/sdk-v3.js";

// Options, warnings, hooks and logging
export type { MappingOptions, MappingWarning, ReconstructionResult, PutOptions, GetOptions, QueryOptions } from "./types/operations.js";
export type { FieldEncryptor, FieldEncryptionContext } from "./types/hooks.js";
export { createConsoleLogger, silentLogger, type ConsoleLoggerOptions, type LogContext, type LogLevel, type MappingLogger } from "./types/logger.js";

// Errors and diagnostics
export type {
  MappingError,
  ConversionError,
  IncompleteKeyError,
  KeyExtractionError,
  EntityConstructionError,
  SerializationError,
  EncryptionError,
  DiscriminatorMismatchError,
  StoreError,
} from "./types/errors.js";
export type { MappingValidationError, ValidationIssue, ValidationPhase } from "./validation/errors.js";
export type { Diagnostic, DiagnosticCode, DiagnosticSeverity, SchemaBuildError } from "./validation/diagnostics.js";

// Result type and helpers
export { type Result, ok, err } from "./types/common.js";

// Marshalling
export type { AttributeValue, AttributeMap, AttributeValueType } from "./marshalling/types.js";
export { marshallValue, marshallItem } from "./marshalling/marshall.js";
export { unmarshallValue, unmarshallItem } from "./marshalling/unmarshall.js";

// Standard Schema types
export type { StandardSchemaV1 } from "./standard-schema/types.js";
