/**
 * Field encryption hook types.
 */

/** What an encryptor is told about the value it is handling. */
export interface FieldEncryptionContext {
  readonly entityId: string;
  readonly fieldName: string;
  readonly attributeName: string;
  /** Text of the record's partition key, when it has one. */
  readonly partitionKey: string | undefined;
}

/**
 * Encrypts and decrypts the bytes of fields marked `encrypted: true`.
 *
 * The mapper hands over the UTF-8 bytes of the field's stored text and writes
 * the returned ciphertext as a binary (`B`) attribute. Both methods may be
 * synchronous or asynchronous; throwing surfaces a `MappingError` with
 * `kind: "encryption"`.
 *
 * Method shorthand is used so `strictFunctionTypes` does not apply, matching
 * how implementations are usually written as object literals or classes.
 *
 * @example
 * ```ts
 * const encryptor: FieldEncryptor = {
 *   encrypt: (plaintext, ctx) => kms.encrypt(plaintext, { field: ctx.fieldName }),
 *   decrypt: (ciphertext, ctx) => kms.decrypt(ciphertext, { field: ctx.fieldName }),
 * };
 * ```
 */
export interface FieldEncryptor {
  encrypt(
    plaintext: Uint8Array,
    context: FieldEncryptionContext,
  ): Uint8Array | Promise<Uint8Array>;
  decrypt(
    ciphertext: Uint8Array,
    context: FieldEncryptionContext,
  ): Uint8Array | Promise<Uint8Array>;
}
