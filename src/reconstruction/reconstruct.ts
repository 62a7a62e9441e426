/**
 * Rebuilds logical entities from flat record sequences, such as the pages of
 * a partition query.
 */

import { matches } from "../discrimination/entity-discriminator.js";
import { matchValue } from "../discrimination/value-matcher.js";
import { finalizeEntity, fromRecord, readRecord } from "../mapping/record-mapper.js";
import { type AttributeMap, scalarText } from "../marshalling/types.js";
import { type Result, ok } from "../types/common.js";
import type { MappingError } from "../types/errors.js";
import { silentLogger } from "../types/logger.js";
import type {
  MappingOptions,
  MappingWarning,
  ReconstructionResult,
} from "../types/operations.js";
import type { RelationshipDescriptor, SchemaModel } from "../types/schema.js";

interface PartitionGroup {
  readonly partitionKey: string;
  readonly records: AttributeMap[];
}

const groupByPartition = (
  records: readonly AttributeMap[],
  model: SchemaModel,
  warnings: MappingWarning[],
): readonly PartitionGroup[] => {
  const groups = new Map<string, PartitionGroup>();
  const attribute = model.partitionKey.storedName;

  for (const [recordIndex, record] of records.entries()) {
    const partitionKey = scalarText(record[attribute]);
    if (partitionKey === undefined) {
      warnings.push({
        code: "MissingPartitionKeyValue",
        message: `Record ${recordIndex} has no "${attribute}" value and was skipped`,
        recordIndex,
      });
      continue;
    }
    const group = groups.get(partitionKey);
    if (group) group.records.push(record);
    else groups.set(partitionKey, { partitionKey, records: [record] });
  }
  return [...groups.values()];
};

const claims = (
  record: AttributeMap,
  relationship: RelationshipDescriptor,
  sortKeyAttribute: string | undefined,
): boolean => {
  const sortKey = sortKeyAttribute === undefined ? undefined : scalarText(record[sortKeyAttribute]);
  return (
    sortKey !== undefined &&
    matchValue(relationship.sortKeyPattern, sortKey) &&
    matches(record, relationship.target)
  );
};

/**
 * Rebuilds entities of `model` from a flat record sequence.
 *
 * Records are grouped by partition key in first-seen order. In each group the
 * first record the model's discriminator accepts is the primary; every other
 * record goes to the first relationship whose sort-key pattern and target
 * discriminator both accept it. Children keep their input order. Groups with
 * no primary are reported as `OrphanedChildRecords` and produce no entity.
 *
 * Warnings are returned and also logged at warn.
 *
 * @example
 * ```ts
 * const result = await reconstruct(items, orderModel);
 * // result.data.entities[0].lines -> LineItem[] in sort-key order of the input
 * ```
 */
export const reconstruct = async <T extends object>(
  records: readonly AttributeMap[],
  model: SchemaModel<T>,
  options: MappingOptions = {},
): Promise<Result<ReconstructionResult<T>, MappingError>> => {
  const logger = options.logger ?? silentLogger;
  const warnings: MappingWarning[] = [];
  const entities: T[] = [];
  const sortKeyAttribute = model.sortKey?.storedName;

  for (const group of groupByPartition(records, model, warnings)) {
    const primaries = group.records.filter((r) => matches(r, model));
    const primary = primaries[0];
    if (primary === undefined) {
      warnings.push({
        code: "OrphanedChildRecords",
        message: `Partition "${group.partitionKey}" has ${group.records.length} record(s) but no ${model.entityId} record`,
        partitionKey: group.partitionKey,
        recordCount: group.records.length,
      });
      continue;
    }
    if (primaries.length > 1) {
      warnings.push({
        code: "DuplicatePrimaryRecord",
        message: `Partition "${group.partitionKey}" has ${primaries.length} ${model.entityId} records; using the first`,
        partitionKey: group.partitionKey,
        recordCount: primaries.length,
      });
    }

    const assigned = new Map<RelationshipDescriptor, AttributeMap[]>(
      model.relationships.map((r) => [r, []]),
    );
    for (const record of group.records) {
      if (primaries.includes(record)) continue;
      const claimants = model.relationships.filter((r) => claims(record, r, sortKeyAttribute));
      const first = claimants[0];
      if (first === undefined) {
        logger.debug("Record matched no relationship", {
          entityId: model.entityId,
          partitionKey: group.partitionKey,
          sortKey: sortKeyAttribute === undefined ? undefined : scalarText(record[sortKeyAttribute]),
        });
        continue;
      }
      if (claimants.length > 1) {
        const sortKey = sortKeyAttribute === undefined ? undefined : scalarText(record[sortKeyAttribute]);
        warnings.push({
          code: "AmbiguousRelationshipMatch",
          message: `Record "${sortKey ?? ""}" matches ${claimants.map((c) => c.targetFieldName).join(", ")}; assigned to ${first.targetFieldName}`,
          partitionKey: group.partitionKey,
          sortKey,
          fields: claimants.map((c) => c.targetFieldName),
        });
      }
      assigned.get(first)?.push(record);
    }

    const properties = await readRecord(primary, model, options);
    if (!properties.success) return properties;

    for (const [relationship, children] of assigned) {
      const mapped: object[] = [];
      for (const child of children) {
        const entity = await fromRecord(child, relationship.target, options);
        if (!entity.success) return entity;
        mapped.push(entity.data);
      }

      if (mapped.length === 0) {
        logger.debug("Relationship matched no records", {
          entityId: model.entityId,
          partitionKey: group.partitionKey,
          field: relationship.targetFieldName,
        });
      }
      if (relationship.isCollection) {
        properties.data[relationship.targetFieldName] = mapped;
        continue;
      }
      const [single] = mapped;
      if (single !== undefined) properties.data[relationship.targetFieldName] = single;
      if (mapped.length > 1) {
        warnings.push({
          code: "MultipleSingularMatches",
          message: `Partition "${group.partitionKey}" has ${mapped.length} records for ${relationship.targetFieldName}; using the first`,
          partitionKey: group.partitionKey,
          field: relationship.targetFieldName,
          recordCount: mapped.length,
        });
      }
    }

    const entity = await finalizeEntity(properties.data, model, options);
    if (!entity.success) return entity;
    entities.push(entity.data);
  }

  for (const warning of warnings) {
    const { message, ...context } = warning;
    logger.warn(message, context);
  }

  return ok(Object.freeze({ entities: Object.freeze(entities), warnings: Object.freeze(warnings) }));
};
