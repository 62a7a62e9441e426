/**
 * Wrapper around StandardSchemaV1.validate() that normalizes sync/async
 * results and returns a Result type.
 */

import type { StandardSchemaV1 } from "../standard-schema/types.js";
import { type Result, ok, err } from "../types/common.js";
import {
  type MappingValidationError,
  type ValidationPhase,
  createValidationError,
} from "./errors.js";

/** Identifies the entity and the mapping direction a validation runs for. */
export interface ValidationContext {
  readonly schemaId: string;
  readonly phase: ValidationPhase;
}

/**
 * Validates a value against a Standard Schema V1 compatible schema.
 *
 * Zod validates synchronously; other libraries may return a Promise. Both are
 * awaited the same way. The schema's output replaces the input, so transforms
 * and defaults apply.
 *
 * @example
 * ```ts
 * const result = await validate(orderSchema, order, { schemaId: "Order", phase: "write" });
 * if (!result.success) console.error(result.error.issues);
 * ```
 */
export const validate = async <Output>(
  schema: StandardSchemaV1<unknown, Output>,
  value: unknown,
  context: ValidationContext,
): Promise<Result<Output, MappingValidationError>> => {
  const result = await schema["~standard"].validate(value);

  if (result.issues !== undefined) {
    return err(createValidationError(context.schemaId, context.phase, result.issues));
  }

  return ok(result.value);
};
