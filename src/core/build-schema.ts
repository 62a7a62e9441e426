/**
 * Compiles validated entity definitions into frozen schema models.
 */

import { compileMatcher } from "../discrimination/value-matcher.js";
import { topologicalOrder } from "../keys/dependency-graph.js";
import { parseTemplate } from "../keys/template-parser.js";
import { type Result, ok, err } from "../types/common.js";
import type { EntityDefinition, FieldConfig } from "../types/entity.js";
import { type MappingLogger, silentLogger } from "../types/logger.js";
import type {
  DerivedKeyRule,
  DiscriminatorRule,
  ExtractedKeyRule,
  FieldDescriptor,
  RelationshipDescriptor,
  SchemaModel,
} from "../types/schema.js";
import type { TableDefinition } from "../types/table.js";
import {
  type Diagnostic,
  type SchemaBuildError,
  createSchemaBuildError,
  hasErrors,
} from "../validation/diagnostics.js";
import {
  validateEntityDefinition,
  validateRelationshipGraph,
  validateTableShapes,
} from "../validation/validate-schema.js";
import {
  collectDefinitions,
  fieldEntries,
  relationshipEntries,
} from "./definition-entries.js";
import { resolveKeyRole, resolveStoredName } from "./key-layout.js";

const DEFAULT_SEPARATOR = "#";

/** Options for schema building. */
export interface BuildSchemaOptions {
  /** Receives warning-severity diagnostics. */
  readonly logger?: MappingLogger | undefined;
}

/** Models built together, looked up by entity name or table. */
export interface SchemaRegistry {
  readonly models: readonly SchemaModel[];
  readonly warnings: readonly Diagnostic[];
  readonly get: (entityId: string) => SchemaModel | undefined;
  /** Models stored in `tableName`, in build order. */
  readonly forTable: (tableName: string) => readonly SchemaModel[];
}

/**
 * A field descriptor without its derivation or extraction rule. Rules point
 * at these so descriptors of fields that derive and extract from each other
 * (a key and its components) can all be frozen.
 */
const baseDescriptor = (
  name: string,
  config: FieldConfig,
  table: TableDefinition | undefined,
): FieldDescriptor => {
  const role = table
    ? resolveKeyRole(config, table)
    : { role: "none" as const, indexName: undefined };
  return Object.freeze({
    sourceName: name,
    storedName: table ? resolveStoredName(name, config, table) : (config.attributeName ?? name),
    scalarType: config.type,
    isCollection: config.collection !== undefined,
    collectionKind: config.collection,
    isNullable: config.nullable ?? false,
    storeNull: config.storeNull ?? false,
    isStored: config.extractedFrom === undefined,
    keyRole: role.role,
    indexName: role.indexName,
    format: config.format,
    timeZone: config.timeZone,
    enumValues: config.enumValues ? Object.freeze([...config.enumValues]) : undefined,
    shape: config.shape
      ? Object.freeze(fieldEntries(config.shape).map(([n, c]) => baseDescriptor(n, c, undefined)))
      : undefined,
    encrypted: config.encrypted ?? false,
    derivedFrom: undefined,
    extractedFrom: undefined,
  });
};

const compileFields = (definition: EntityDefinition): readonly FieldDescriptor[] => {
  const entries = fieldEntries(definition.fields);
  const bases = new Map(
    entries.map(([name, config]) => [name, baseDescriptor(name, config, definition.table)]),
  );
  const base = (name: string): FieldDescriptor => {
    const descriptor = bases.get(name);
    if (descriptor === undefined) {
      throw new Error(`Unknown field "${name}" in ${definition.name}; definitions must be validated before compiling`);
    }
    return descriptor;
  };

  return entries.map(([name, config]) => {
    const derived = config.derivedFrom;
    const extracted = config.extractedFrom;

    const derivedFrom: DerivedKeyRule | undefined = derived
      ? Object.freeze({
          sources: Object.freeze(derived.sources.map(base)),
          template: derived.template !== undefined ? parseTemplate(derived.template) : undefined,
          separator: derived.separator ?? DEFAULT_SEPARATOR,
        })
      : undefined;

    const extractedFrom: ExtractedKeyRule | undefined = extracted
      ? "template" in extracted
        ? Object.freeze({
            kind: "template" as const,
            source: base(extracted.source),
            template: parseTemplate(extracted.template),
            policy: extracted.policy,
          })
        : Object.freeze({
            kind: "position" as const,
            source: base(extracted.source),
            index: extracted.index,
            separator: extracted.separator ?? DEFAULT_SEPARATOR,
            policy: extracted.policy,
          })
      : undefined;

    return Object.freeze({ ...base(name), derivedFrom, extractedFrom });
  });
};

const orderBy = (
  fields: readonly FieldDescriptor[],
  dependsOn: (field: FieldDescriptor) => readonly string[],
): readonly FieldDescriptor[] => {
  const byName = new Map(fields.map((f) => [f.sourceName, f]));
  return Object.freeze(
    topologicalOrder(fields.map((f) => ({ name: f.sourceName, dependsOn: dependsOn(f) }))).flatMap(
      (name) => byName.get(name) ?? [],
    ),
  );
};

const compileDiscriminator = (
  definition: EntityDefinition,
  storedFields: readonly FieldDescriptor[],
  sortKey: FieldDescriptor | undefined,
): DiscriminatorRule => {
  const config = definition.discriminator;
  return Object.freeze({
    attribute: config?.attribute
      ? Object.freeze({
          attributeName: config.attribute.name,
          matcher: compileMatcher(config.attribute.value),
        })
      : undefined,
    sortKey:
      config?.sortKey !== undefined && sortKey !== undefined
        ? Object.freeze({
            attributeName: sortKey.storedName,
            matcher: compileMatcher(config.sortKey, { segmentSeparator: DEFAULT_SEPARATOR }),
          })
        : undefined,
    requiredAttributes: Object.freeze(
      storedFields
        .filter((f) => !f.isNullable && f.collectionKind !== "set")
        .map((f) => f.storedName),
    ),
  });
};

/**
 * Compiles one validated definition. `resolve` supplies relationship target
 * models.
 */
const compileModel = <T extends object>(
  definition: EntityDefinition<T>,
  resolve: (target: EntityDefinition) => SchemaModel,
): SchemaModel<T> => {
  const fields = compileFields(definition);
  const storedFields = Object.freeze(fields.filter((f) => f.isStored));
  const partitionKey = fields.find((f) => f.keyRole === "partition");
  if (partitionKey === undefined) {
    throw new Error(`${definition.name} has no partition key; definitions must be validated before compiling`);
  }
  const sortKey = fields.find((f) => f.keyRole === "sort");
  const discriminator = compileDiscriminator(definition, storedFields, sortKey);

  const relationships: readonly RelationshipDescriptor[] = Object.freeze(
    relationshipEntries(definition).map(([name, config]) =>
      Object.freeze({
        targetFieldName: name,
        sortKeyPattern: compileMatcher(config.sortKeyPattern, { segmentSeparator: DEFAULT_SEPARATOR }),
        target: resolve(config.target),
        isCollection: config.collection,
      }),
    ),
  );

  const attributeRule = discriminator.attribute;
  const discriminatorLiteral =
    attributeRule !== undefined &&
    attributeRule.matcher.strategy === "exact" &&
    !storedFields.some((f) => f.storedName === attributeRule.attributeName)
      ? Object.freeze({ attributeName: attributeRule.attributeName, value: attributeRule.matcher.pattern })
      : undefined;

  return Object.freeze({
    entityId: definition.name,
    tableName: definition.table.tableName,
    fields: Object.freeze(fields),
    relationships,
    discriminator,
    partitionKey,
    sortKey,
    storedFields,
    derivedOrder: orderBy(
      fields.filter((f) => f.derivedFrom !== undefined),
      (f) => f.derivedFrom?.sources.map((s) => s.sourceName) ?? [],
    ),
    extractedFields: orderBy(
      fields.filter((f) => f.extractedFrom !== undefined),
      (f) => (f.extractedFrom ? [f.extractedFrom.source.sourceName] : []),
    ),
    discriminatorLiteral,
    schema: definition.schema,
    definition,
  });
};

interface PreparedBuild {
  readonly resolve: (definition: EntityDefinition) => SchemaModel;
  readonly definitions: readonly EntityDefinition[];
  readonly warnings: readonly Diagnostic[];
}

const prepare = (
  roots: readonly EntityDefinition[],
  options: BuildSchemaOptions,
): Result<PreparedBuild, SchemaBuildError> => {
  const definitions = collectDefinitions(roots);
  const diagnostics = [
    ...definitions.flatMap((d) => validateEntityDefinition(d)),
    ...validateRelationshipGraph(definitions),
    ...validateTableShapes(definitions),
  ];
  if (hasErrors(diagnostics)) return err(createSchemaBuildError(diagnostics));

  const warnings = Object.freeze(diagnostics.filter((d) => d.severity === "warning"));
  const logger = options.logger ?? silentLogger;
  for (const warning of warnings) {
    logger.warn(warning.message, { code: warning.code, entityId: warning.entityId, fieldPath: warning.fieldPath });
  }

  const built = new Map<EntityDefinition, SchemaModel>();
  const resolve = (definition: EntityDefinition): SchemaModel => {
    const existing = built.get(definition);
    if (existing !== undefined) return existing;
    const model = compileModel(definition, resolve);
    built.set(definition, model);
    return model;
  };

  return ok({ resolve, definitions, warnings });
};

/**
 * Validates and compiles a set of entity definitions that are used together,
 * typically every shape stored in one table. Relationship targets are
 * included automatically.
 *
 * All problems are reported at once in a single `SchemaBuildError`.
 * Warning-severity diagnostics do not fail the build; they are returned on
 * the registry and sent to the logger.
 *
 * @example
 * ```ts
 * const result = buildSchema([orderEntity, customerEntity]);
 * if (!result.success) {
 *   for (const d of result.error.diagnostics) console.error(d.code, d.message);
 * } else {
 *   const order = result.data.get("Order");
 * }
 * ```
 */
export const buildSchema = (
  definitions: readonly EntityDefinition[],
  options: BuildSchemaOptions = {},
): Result<SchemaRegistry, SchemaBuildError> => {
  const prepared = prepare(definitions, options);
  if (!prepared.success) return prepared;

  const models = Object.freeze(prepared.data.definitions.map((d) => prepared.data.resolve(d)));
  const byId = new Map(models.map((m) => [m.entityId, m]));

  return ok(
    Object.freeze({
      models,
      warnings: prepared.data.warnings,
      get: (entityId: string) => byId.get(entityId),
      forTable: (tableName: string) => models.filter((m) => m.tableName === tableName),
    }),
  );
};

/**
 * Validates and compiles a single entity definition and its relationship
 * targets, keeping the domain type.
 *
 * @example
 * ```ts
 * const result = buildSchemaModel(orderEntity);
 * if (result.success) {
 *   const record = await toRecord(order, result.data);
 * }
 * ```
 */
export const buildSchemaModel = <T extends object>(
  definition: EntityDefinition<T>,
  options: BuildSchemaOptions = {},
): Result<SchemaModel<T>, SchemaBuildError> => {
  const prepared = prepare([definition], options);
  if (!prepared.success) return prepared;
  return ok(compileModel(definition, prepared.data.resolve));
};
