/**
 * Errors raised when an entity's Standard Schema rejects a value.
 */

import type { StandardSchemaV1 } from "../standard-schema/types.js";

/** A single validation issue with path and message. */
export interface ValidationIssue {
  readonly message: string;
  readonly path?: readonly (PropertyKey | { readonly key: PropertyKey })[];
}

/**
 * Which side of the mapping rejected the value: `write` checks the domain
 * object handed to `toRecord`, `read` checks the object built by `fromRecord`.
 */
export type ValidationPhase = "write" | "read";

/** Error returned when an entity's schema rejects a value. */
export interface MappingValidationError {
  readonly kind: "validation";
  readonly message: string;
  readonly schemaId: string;
  readonly phase: ValidationPhase;
  readonly issues: readonly ValidationIssue[];
}

const formatPath = (issue: StandardSchemaV1.Issue): string =>
  issue.path
    ? issue.path
        .map((segment) =>
          typeof segment === "object" ? String(segment.key) : String(segment),
        )
        .join(".")
    : "";

/**
 * Creates a MappingValidationError from StandardSchemaV1 issues.
 *
 * @example
 * ```ts
 * createValidationError("Order", "write", [{ message: "Required", path: ["total"] }]);
 * // message: 'Order failed validation on write: total: Required'
 * ```
 */
export const createValidationError = (
  schemaId: string,
  phase: ValidationPhase,
  issues: ReadonlyArray<StandardSchemaV1.Issue>,
): MappingValidationError =>
  Object.freeze({
    kind: "validation" as const,
    message: `${schemaId} failed validation on ${phase}: ${issues
      .map((i) => {
        const path = formatPath(i);
        return path ? `${path}: ${i.message}` : i.message;
      })
      .join("; ")}`,
    schemaId,
    phase,
    issues: Object.freeze(
      issues.map((issue) =>
        Object.freeze({
          message: issue.message,
          ...(issue.path ? { path: issue.path } : {}),
        }),
      ),
    ),
  });
