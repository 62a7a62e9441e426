/**
 * Schema-build diagnostics.
 */

/** Every problem schema building can report. */
export type DiagnosticCode =
  | "MissingPartitionKey"
  | "MultiplePartitionKeys"
  | "MultipleSortKeys"
  | "CollectionKeyField"
  | "UnsupportedKeyFieldType"
  | "ConflictingFieldRoles"
  | "DuplicateAttributeName"
  | "DuplicateEntityName"
  | "KeyAttributeMismatch"
  | "InvalidIndexConfiguration"
  | "UnsupportedSetElementType"
  | "MissingEnumValues"
  | "CircularKeyDependency"
  | "SelfReferencingDerivedKey"
  | "CircularRelationship"
  | "InvalidDerivedKeySource"
  | "InvalidDerivedKeyFormat"
  | "InvalidExtractedKeySource"
  | "InvalidExtractedKeyIndex"
  | "InvalidFormat"
  | "InvalidTimeZone"
  | "UnsupportedEncryptedField"
  | "InvalidDiscriminator"
  | "InvalidRelationshipTarget"
  | "RelatedEntitiesRequireSortKey"
  | "AmbiguousRelationshipPattern"
  | "ConflictingRelationshipPatterns"
  | "ConflictingEntityShapes";

export type DiagnosticSeverity = "error" | "warning";

/** One finding about an entity definition. */
export interface Diagnostic {
  readonly code: DiagnosticCode;
  readonly severity: DiagnosticSeverity;
  readonly message: string;
  readonly entityId: string;
  /** Dotted path of the offending field or relationship, when there is one. */
  readonly fieldPath: string | undefined;
}

/** Every error-severity diagnostic of a failed build, plus its warnings. */
export interface SchemaBuildError {
  readonly type: "schemaBuild";
  readonly message: string;
  readonly diagnostics: readonly Diagnostic[];
}

/** Creates an error-severity diagnostic. */
export const createDiagnostic = (
  code: DiagnosticCode,
  entityId: string,
  fieldPath: string | undefined,
  message: string,
): Diagnostic =>
  Object.freeze({ code, severity: "error" as const, message, entityId, fieldPath });

/** Creates a warning-severity diagnostic. */
export const createWarning = (
  code: DiagnosticCode,
  entityId: string,
  fieldPath: string | undefined,
  message: string,
): Diagnostic =>
  Object.freeze({ code, severity: "warning" as const, message, entityId, fieldPath });

/** Whether any diagnostic is an error. */
export const hasErrors = (diagnostics: readonly Diagnostic[]): boolean =>
  diagnostics.some((d) => d.severity === "error");

/**
 * Creates a SchemaBuildError summarising `diagnostics`.
 *
 * @example
 * ```ts
 * createSchemaBuildError([createDiagnostic("MissingPartitionKey", "Order", undefined, "...")]).message;
 * // "Schema build failed with 1 error: [Order] MissingPartitionKey: ..."
 * ```
 */
export const createSchemaBuildError = (
  diagnostics: readonly Diagnostic[],
): SchemaBuildError => {
  const errors = diagnostics.filter((d) => d.severity === "error");
  const lines = errors.map(
    (d) =>
      `[${d.fieldPath ? `${d.entityId}.${d.fieldPath}` : d.entityId}] ${d.code}: ${d.message}`,
  );
  return Object.freeze({
    type: "schemaBuild" as const,
    message: `Schema build failed with ${errors.length} error${errors.length === 1 ? "" : "s"}: ${lines.join("; ")}`,
    diagnostics: Object.freeze([...diagnostics]),
  });
};
