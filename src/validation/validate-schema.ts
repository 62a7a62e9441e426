/**
 * Eager validation of entity definitions. Every check appends diagnostics;
 * nothing stops at the first problem.
 */

import {
  checkDateTimeFormat,
  isNumberFormat,
  isValidTimeZone,
} from "../codec/formats.js";
import { fieldEntries, relationshipEntries } from "../core/definition-entries.js";
import { resolveKeyRole, resolveStoredName } from "../core/key-layout.js";
import { patternsOverlap } from "../discrimination/value-matcher.js";
import { findCycles } from "../keys/dependency-graph.js";
import { parseTemplate } from "../keys/template-parser.js";
import type { EntityDefinition, FieldConfig, ScalarType } from "../types/entity.js";
import type { KeyAttributeType } from "../types/table.js";
import {
  type Diagnostic,
  type DiagnosticCode,
  createDiagnostic,
  createWarning,
} from "./diagnostics.js";

const SET_ELEMENT_TYPES: ReadonlySet<ScalarType> = new Set(["string", "number", "binary", "datetime", "enum"]);
const KEY_TYPES: ReadonlySet<ScalarType> = new Set(["string", "number", "binary"]);

const KEY_ATTRIBUTE_TYPES: Readonly<Partial<Record<ScalarType, KeyAttributeType>>> = {
  string: "S",
  number: "N",
  binary: "B",
};
const EXTRACTED_TYPES: ReadonlySet<ScalarType> = new Set(["string", "number", "datetime", "enum"]);
const ENCRYPTABLE_TYPES: ReadonlySet<ScalarType> = new Set(["string", "number", "datetime", "enum"]);
const KEY_MATERIAL_TYPES: ReadonlySet<ScalarType> = new Set(["string", "number", "boolean", "datetime", "enum"]);

type Report = (code: DiagnosticCode, fieldPath: string | undefined, message: string) => void;

/** Checks that apply to any field, nested or top-level. */
const checkFieldShape = (path: string, config: FieldConfig, report: Report): void => {
  if (config.collection === "set" && !SET_ELEMENT_TYPES.has(config.type)) {
    report("UnsupportedSetElementType", path, `sets cannot hold ${config.type} values`);
  }

  if (config.type === "enum" && (config.enumValues === undefined || config.enumValues.length === 0)) {
    report("MissingEnumValues", path, "enum fields must list their enumValues");
  }

  if (config.format !== undefined) {
    if (config.type === "number") {
      if (!isNumberFormat(config.format)) {
        report("InvalidFormat", path, `"${config.format}" is not a number format (expected F<n> or D<n>)`);
      }
    } else if (config.type === "datetime") {
      const problem = checkDateTimeFormat(config.format);
      if (problem !== undefined) {
        report("InvalidFormat", path, `"${config.format}" is not a datetime format: ${problem}`);
      }
    } else {
      report("InvalidFormat", path, `format applies to number and datetime fields, not ${config.type}`);
    }
  }

  if (config.timeZone !== undefined) {
    if (config.type !== "datetime") {
      report("InvalidTimeZone", path, `timeZone applies to datetime fields, not ${config.type}`);
    } else if (!isValidTimeZone(config.timeZone)) {
      report("InvalidTimeZone", path, `"${config.timeZone}" is not a known IANA time zone`);
    }
  }

  if (config.shape !== undefined) {
    if (config.type !== "nested") {
      report("ConflictingFieldRoles", path, "shape applies to nested fields only");
      return;
    }
    for (const [childName, child] of fieldEntries(config.shape)) {
      const childPath = `${path}.${childName}`;
      if (child.key !== undefined || child.derivedFrom !== undefined || child.extractedFrom !== undefined || child.encrypted === true) {
        report("ConflictingFieldRoles", childPath, "nested fields cannot be keys, derived, extracted or encrypted");
      }
      checkFieldShape(childPath, child, report);
    }
  }
};

/** Key role counts, key attribute names and index wiring. */
const checkKeys = (definition: EntityDefinition, report: Report): void => {
  const { table } = definition;
  const fields = fieldEntries(definition.fields);
  const partitionKeys = fields.filter(([, c]) => c.key === "partition");
  const sortKeys = fields.filter(([, c]) => c.key === "sort");

  if (partitionKeys.length === 0) {
    report("MissingPartitionKey", undefined, "exactly one field must have key: \"partition\"");
  } else if (partitionKeys.length > 1) {
    report("MultiplePartitionKeys", undefined, `partition key declared on ${partitionKeys.map(([n]) => n).join(", ")}`);
  }

  if (sortKeys.length > 1) {
    report("MultipleSortKeys", undefined, `sort key declared on ${sortKeys.map(([n]) => n).join(", ")}`);
  }
  if (sortKeys.length === 0 && table.sortKey !== undefined) {
    report("KeyAttributeMismatch", undefined, `table "${table.tableName}" has sort key "${table.sortKey.name}" but no field maps it`);
  }

  const indexRoles = new Map<string, string>();
  for (const [name, config] of fields) {
    if (config.key === undefined) continue;
    const resolved = resolveKeyRole(config, table);

    if (config.collection !== undefined) {
      report("CollectionKeyField", name, "key fields cannot be collections");
    } else if (!KEY_TYPES.has(config.type)) {
      report("UnsupportedKeyFieldType", name, `key fields must be string, number or binary, not ${config.type}`);
    }

    if (resolved.role === "gsiPartition" || resolved.role === "gsiSort") {
      const slot = `${resolved.indexName ?? ""}:${resolved.role}`;
      const previous = indexRoles.get(slot);
      if (resolved.keyAttribute === undefined) {
        report("InvalidIndexConfiguration", name, `table "${table.tableName}" has no index "${resolved.indexName ?? ""}" with a ${resolved.role === "gsiPartition" ? "partition" : "sort"} key`);
      } else if (previous !== undefined) {
        report("InvalidIndexConfiguration", name, `index "${resolved.indexName ?? ""}" key already mapped by "${previous}"`);
      }
      indexRoles.set(slot, name);
    } else {
      if (config.nullable === true) {
        report("ConflictingFieldRoles", name, "primary key fields cannot be nullable");
      }
      if (resolved.keyAttribute === undefined) {
        report("KeyAttributeMismatch", name, `table "${table.tableName}" has no sort key`);
        continue;
      }
    }

    const storedType = config.collection === undefined ? KEY_ATTRIBUTE_TYPES[config.type] : undefined;
    if (resolved.keyType !== undefined && storedType !== undefined && storedType !== resolved.keyType) {
      report("KeyAttributeMismatch", name, `field stores ${storedType} but key attribute "${resolved.keyAttribute ?? ""}" is ${resolved.keyType}`);
    }

    if (config.attributeName !== undefined && resolved.keyAttribute !== undefined && config.attributeName !== resolved.keyAttribute) {
      report("KeyAttributeMismatch", name, `attribute "${config.attributeName}" does not match the table key attribute "${resolved.keyAttribute}"`);
    }
  }
};

/** Exclusive roles, stored-name collisions, encryption eligibility. */
const checkRoles = (definition: EntityDefinition, report: Report): void => {
  const storedNames = new Map<string, string>();

  for (const [name, config] of fieldEntries(definition.fields)) {
    if (config.derivedFrom !== undefined && config.extractedFrom !== undefined) {
      report("ConflictingFieldRoles", name, "a field cannot be both derived and extracted");
    }
    if (config.extractedFrom !== undefined && config.key !== undefined) {
      report("ConflictingFieldRoles", name, "extracted fields are not stored and cannot be keys");
    }

    if (config.encrypted === true) {
      if (config.collection !== undefined || !ENCRYPTABLE_TYPES.has(config.type)) {
        report("UnsupportedEncryptedField", name, "only scalar string, number, datetime and enum fields can be encrypted");
      } else if (config.key !== undefined || config.derivedFrom !== undefined || config.extractedFrom !== undefined) {
        report("UnsupportedEncryptedField", name, "key, derived and extracted fields cannot be encrypted");
      }
    }

    checkFieldShape(name, config, report);

    if (config.extractedFrom !== undefined) continue;
    const storedName = resolveStoredName(name, config, definition.table);
    const previous = storedNames.get(storedName);
    if (previous !== undefined) {
      report("DuplicateAttributeName", name, `attribute "${storedName}" is already mapped by "${previous}"`);
    } else {
      storedNames.set(storedName, name);
    }
  }
};

/** Cycles among derived fields and among extracted fields. */
const checkKeyCycles = (definition: EntityDefinition, report: Report): void => {
  const fields = new Map(fieldEntries(definition.fields));
  const derivedNodes: { name: string; dependsOn: readonly string[] }[] = [];
  const extractedNodes: { name: string; dependsOn: readonly string[] }[] = [];

  for (const [name, config] of fields) {
    if (config.derivedFrom !== undefined) {
      derivedNodes.push({
        name,
        dependsOn: config.derivedFrom.sources.filter((s) => fields.get(s)?.derivedFrom !== undefined),
      });
    }
    const extracted = config.extractedFrom;
    if (extracted !== undefined) {
      extractedNodes.push({
        name,
        dependsOn: fields.get(extracted.source)?.extractedFrom !== undefined ? [extracted.source] : [],
      });
    }
  }

  for (const cycle of [...findCycles(derivedNodes), ...findCycles(extractedNodes)]) {
    report("CircularKeyDependency", cycle[0], `circular key dependency: ${cycle.join(" -> ")}`);
  }
};

/** Sources, templates and indexes of derived and extracted key rules. */
const checkKeyRules = (definition: EntityDefinition, report: Report): void => {
  const fields = new Map(fieldEntries(definition.fields));

  for (const [name, config] of fields) {
    const derived = config.derivedFrom;
    if (derived !== undefined) {
      if (config.type !== "string" || config.collection !== undefined) {
        report("InvalidDerivedKeyFormat", name, "derived fields hold text and must be scalar string fields");
      }
      if (derived.separator === "") {
        report("InvalidDerivedKeyFormat", name, "separator cannot be empty");
      }
      if (derived.sources.length === 0 && derived.template === undefined) {
        report("InvalidDerivedKeyFormat", name, "a derived field needs sources or a constant template");
      }

      for (const source of derived.sources) {
        const sourceConfig = fields.get(source);
        if (source === name) {
          report("SelfReferencingDerivedKey", name, `"${name}" cannot be derived from itself`);
        } else if (sourceConfig === undefined) {
          report("InvalidDerivedKeySource", name, `source "${source}" is not a field of ${definition.name}`);
        } else if (sourceConfig.collection !== undefined || !KEY_MATERIAL_TYPES.has(sourceConfig.type)) {
          report("InvalidDerivedKeySource", name, `source "${source}" cannot be rendered into a key`);
        }
      }

      if (derived.template !== undefined) {
        const placeholders = parseTemplate(derived.template).fields;
        for (const placeholder of placeholders) {
          if (!derived.sources.includes(placeholder)) {
            report("InvalidDerivedKeyFormat", name, `template placeholder "{{${placeholder}}}" is not a listed source`);
          }
        }
        for (const source of derived.sources) {
          if (!placeholders.includes(source)) {
            report("InvalidDerivedKeyFormat", name, `source "${source}" does not appear in the template`);
          }
        }
      }
    }

    const extracted = config.extractedFrom;
    if (extracted !== undefined) {
      if (config.collection !== undefined || !EXTRACTED_TYPES.has(config.type)) {
        report("UnsupportedKeyFieldType", name, `extracted fields must be scalar string, number, datetime or enum, not ${config.type}`);
      }

      const sourceConfig = fields.get(extracted.source);
      if (extracted.source === name) {
        report("InvalidExtractedKeySource", name, `"${name}" cannot be extracted from itself`);
      } else if (sourceConfig === undefined) {
        report("InvalidExtractedKeySource", name, `source "${extracted.source}" is not a field of ${definition.name}`);
      } else if (sourceConfig.type !== "string" || sourceConfig.collection !== undefined) {
        report("InvalidExtractedKeySource", name, `source "${extracted.source}" must be a scalar string field`);
      }

      if ("template" in extracted) {
        const template = parseTemplate(extracted.template);
        if (!template.fields.includes(name)) {
          report("InvalidExtractedKeyIndex", name, `template "${extracted.template}" has no {{${name}}} placeholder`);
        }
        const adjacent = template.segments.some(
          (segment, i) => segment.type === "field" && template.segments[i + 1]?.type === "field",
        );
        if (adjacent) {
          report("InvalidExtractedKeyIndex", name, `template "${extracted.template}" has placeholders with no literal between them`);
        }
      } else {
        if (!Number.isInteger(extracted.index) || extracted.index < 0) {
          report("InvalidExtractedKeyIndex", name, `index must be a non-negative integer, got ${extracted.index}`);
        }
        if (extracted.separator === "") {
          report("InvalidExtractedKeyIndex", name, "separator cannot be empty");
        }
      }
    }
  }
};

/** Discriminator and relationship declarations of one entity. */
const checkCrossField = (definition: EntityDefinition, report: Report): void => {
  const fields = new Map(fieldEntries(definition.fields));
  const hasSortKey = [...fields.values()].some((c) => c.key === "sort");
  const discriminator = definition.discriminator;

  if (discriminator?.attribute !== undefined) {
    if (discriminator.attribute.name === "" || discriminator.attribute.value === "") {
      report("InvalidDiscriminator", undefined, "discriminator attribute name and value cannot be empty");
    }
  }
  if (discriminator?.sortKey !== undefined) {
    if (!hasSortKey) {
      report("InvalidDiscriminator", undefined, "a sort-key discriminator needs a sort key field");
    } else if (discriminator.sortKey === "") {
      report("InvalidDiscriminator", undefined, "sort-key discriminator pattern cannot be empty");
    }
  }

  const relationships = relationshipEntries(definition);
  if (relationships.length > 0 && !hasSortKey) {
    report("RelatedEntitiesRequireSortKey", undefined, "relationships match child records by sort key; declare a sort key field");
  }

  for (const [name, relationship] of relationships) {
    if (fields.has(name)) {
      report("ConflictingFieldRoles", name, "a property cannot be both a field and a relationship");
    }
    if (relationship.target.table.tableName !== definition.table.tableName) {
      report("InvalidRelationshipTarget", name, `target ${relationship.target.name} lives in table "${relationship.target.table.tableName}", not "${definition.table.tableName}"`);
    }
  }
};

/**
 * Validates one entity definition: structural checks, then key cycles, then
 * key rule references and cross-field rules.
 */
export const validateEntityDefinition = (
  definition: EntityDefinition,
): readonly Diagnostic[] => {
  const diagnostics: Diagnostic[] = [];
  const report: Report = (code, fieldPath, message) =>
    diagnostics.push(createDiagnostic(code, definition.name, fieldPath, message));

  checkKeys(definition, report);
  checkRoles(definition, report);
  checkKeyCycles(definition, report);
  checkKeyRules(definition, report);
  checkCrossField(definition, report);

  const relationships = relationshipEntries(definition);
  for (const [name, relationship] of relationships) {
    if (relationship.sortKeyPattern.replaceAll("*", "") === "") {
      diagnostics.push(createWarning("AmbiguousRelationshipPattern", definition.name, name, `pattern "${relationship.sortKeyPattern}" matches every sort key`));
    }
  }
  for (const [i, [name, relationship]] of relationships.entries()) {
    for (const [otherName, other] of relationships.slice(i + 1)) {
      if (patternsOverlap(relationship.sortKeyPattern, other.sortKeyPattern)) {
        diagnostics.push(
          createWarning(
            "ConflictingRelationshipPatterns",
            definition.name,
            name,
            `patterns "${relationship.sortKeyPattern}" (${name}) and "${other.sortKeyPattern}" (${otherName}) can match the same records; the first declared wins`,
          ),
        );
      }
    }
  }

  return diagnostics;
};

/** Rejects relationship chains that lead back to an entity, including to itself. */
export const validateRelationshipGraph = (
  definitions: readonly EntityDefinition[],
): readonly Diagnostic[] => {
  const selfReferences = definitions.flatMap((definition) =>
    relationshipEntries(definition)
      .filter(([, r]) => r.target.name === definition.name)
      .map(([name]) =>
        createDiagnostic("CircularRelationship", definition.name, name, `circular relationship: ${definition.name} -> ${definition.name}`),
      ),
  );

  const cycles = findCycles(
    definitions.map((definition) => ({
      name: definition.name,
      dependsOn: relationshipEntries(definition).map(([, r]) => r.target.name),
    })),
  ).map((cycle) =>
    createDiagnostic("CircularRelationship", cycle[0] ?? "", undefined, `circular relationship: ${cycle.join(" -> ")}`),
  );

  return [...selfReferences, ...cycles];
};

/** Stored names of the attributes every record of a shape carries, sorted. */
const requiredAttributes = (definition: EntityDefinition): readonly string[] =>
  fieldEntries(definition.fields)
    .filter(([, c]) => c.extractedFrom === undefined && c.nullable !== true && c.collection !== "set")
    .map(([name, c]) => resolveStoredName(name, c, definition.table))
    .sort();

type ShapeKey =
  | { readonly tier: "attribute"; readonly key: string }
  | { readonly tier: "sortKey"; readonly key: string }
  | { readonly tier: "presence"; readonly key: string };

const shapeKey = (definition: EntityDefinition): ShapeKey => {
  const discriminator = definition.discriminator;
  if (discriminator?.attribute !== undefined) {
    return { tier: "attribute", key: `${discriminator.attribute.name}=${discriminator.attribute.value}` };
  }
  if (discriminator?.sortKey !== undefined) {
    return { tier: "sortKey", key: discriminator.sortKey };
  }
  return { tier: "presence", key: requiredAttributes(definition).join(",") };
};

/**
 * Table-level checks over every definition being built together: entity
 * names are unique, and shapes sharing a table are told apart by distinct
 * discriminators.
 */
export const validateTableShapes = (
  definitions: readonly EntityDefinition[],
): readonly Diagnostic[] => {
  const diagnostics: Diagnostic[] = [];

  const names = new Map<string, EntityDefinition>();
  for (const definition of definitions) {
    const previous = names.get(definition.name);
    if (previous !== undefined && previous !== definition) {
      diagnostics.push(createDiagnostic("DuplicateEntityName", definition.name, undefined, `two different definitions are named "${definition.name}"`));
    }
    names.set(definition.name, definition);
  }

  for (const [i, a] of definitions.entries()) {
    for (const b of definitions.slice(i + 1)) {
      if (a.table.tableName !== b.table.tableName || a.name === b.name) continue;
      const keyA = shapeKey(a);
      const keyB = shapeKey(b);
      if (keyA.tier === keyB.tier && keyA.key === keyB.key) {
        diagnostics.push(
          createDiagnostic(
            "ConflictingEntityShapes",
            b.name,
            undefined,
            keyA.tier === "presence"
              ? `${a.name} and ${b.name} share table "${a.table.tableName}" without a discriminator and require the same attributes`
              : `${a.name} and ${b.name} share table "${a.table.tableName}" with the same ${keyA.tier === "attribute" ? "discriminator attribute" : "sort-key pattern"} "${keyA.key}"`,
          ),
        );
      }
    }
  }

  return diagnostics;
};
