/**
 * Result type for operations that can fail.
 * Mapping, key compilation and schema building report failures as values
 * instead of throwing.
 */
export type Result<T, E = Error> =
  | { readonly success: true; readonly data: T }
  | { readonly success: false; readonly error: E };

/** Creates a successful Result. */
export const ok = <T>(data: T): Result<T, never> =>
  Object.freeze({ success: true as const, data });

/** Creates a failed Result. */
export const err = <E>(error: E): Result<never, E> =>
  Object.freeze({ success: false as const, error });
