/**
 * Mapper factory: binds the mapping operations to one configuration.
 */

import { type MatchTier, matchTier, matches, resolveShape, type ShapeResolution } from "../discrimination/entity-discriminator.js";
import { fromMatchingRecord, fromRecord, toRecord } from "../mapping/record-mapper.js";
import type { AttributeMap } from "../marshalling/types.js";
import { reconstruct } from "../reconstruction/reconstruct.js";
import type { Result } from "../types/common.js";
import type { MappingError } from "../types/errors.js";
import { silentLogger } from "../types/logger.js";
import type { MappingOptions, ReconstructionResult } from "../types/operations.js";
import type { SchemaModel } from "../types/schema.js";

/** Mapper-wide configuration. */
export type MapperConfig = MappingOptions;

/** Mapping operations bound to a configuration. */
export interface Mapper {
  readonly config: MappingOptions;
  readonly toRecord: <T extends object>(entity: T, model: SchemaModel<T>) => Promise<Result<AttributeMap, MappingError>>;
  readonly fromRecord: <T extends object>(record: AttributeMap, model: SchemaModel<T>) => Promise<Result<T, MappingError>>;
  readonly fromMatchingRecord: <T extends object>(record: AttributeMap, model: SchemaModel<T>) => Promise<Result<T, MappingError>>;
  readonly reconstruct: <T extends object>(
    records: readonly AttributeMap[],
    model: SchemaModel<T>,
  ) => Promise<Result<ReconstructionResult<T>, MappingError>>;
  readonly matches: (record: AttributeMap, model: SchemaModel) => boolean;
  readonly matchTier: (record: AttributeMap, model: SchemaModel) => MatchTier | undefined;
  /** Resolves a record's shape; ambiguity warnings are also logged. */
  readonly resolveShape: (record: AttributeMap, models: readonly SchemaModel[]) => ShapeResolution;
}

/**
 * Creates a mapper with a fixed logger, field encryptor, extraction policy
 * and validation setting.
 *
 * @example
 * ```ts
 * const mapper = createMapper({
 *   logger: createConsoleLogger({ level: "warn" }),
 *   extraction: "strict",
 * });
 * const record = await mapper.toRecord(customer, customerModel);
 * ```
 */
export const createMapper = (config: MapperConfig = {}): Mapper => {
  const options: MappingOptions = Object.freeze({
    logger: config.logger ?? silentLogger,
    fieldEncryptor: config.fieldEncryptor,
    extraction: config.extraction ?? "lenient",
    validation: config.validation ?? true,
  });
  const logger = options.logger ?? silentLogger;

  return Object.freeze<Mapper>({
    config: options,
    toRecord: (entity, model) => toRecord(entity, model, options),
    fromRecord: (record, model) => fromRecord(record, model, options),
    fromMatchingRecord: (record, model) => fromMatchingRecord(record, model, options),
    reconstruct: (records, model) => reconstruct(records, model, options),
    matches,
    matchTier,
    resolveShape: (record: AttributeMap, models: readonly SchemaModel[]) => {
      const resolution = resolveShape(record, models);
      for (const { message, ...context } of resolution.warnings) logger.warn(message, context);
      return resolution;
    },
  });
};
