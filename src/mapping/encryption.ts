/**
 * Routes encrypted field values through the configured field encryptor.
 */

import { isNumericField } from "../codec/value-codec.js";
import { type AttributeValue, describeAttributeValue } from "../marshalling/types.js";
import { type Result, ok, err } from "../types/common.js";
import { type EncryptionError, createEncryptionError } from "../types/errors.js";
import type { FieldEncryptionContext, FieldEncryptor } from "../types/hooks.js";
import type { FieldDescriptor } from "../types/schema.js";

const encoder = new TextEncoder();
const decoder = new TextDecoder();

/** Builds the context handed to the encryptor for `field`. */
export const encryptionContext = (
  entityId: string,
  field: FieldDescriptor,
  partitionKey: string | undefined,
): FieldEncryptionContext =>
  Object.freeze({
    entityId,
    fieldName: field.sourceName,
    attributeName: field.storedName,
    partitionKey,
  });

/**
 * Encrypts the text of an encoded `S` or `N` node and returns it as `B`.
 */
export const encryptNode = async (
  node: AttributeValue,
  field: FieldDescriptor,
  context: FieldEncryptionContext,
  encryptor: FieldEncryptor | undefined,
): Promise<Result<AttributeValue, EncryptionError>> => {
  if (encryptor === undefined) {
    return err(createEncryptionError(field.sourceName, "encrypt", "no field encryptor is configured"));
  }
  const text = "S" in node ? node.S : "N" in node ? node.N : undefined;
  if (text === undefined) {
    return err(createEncryptionError(field.sourceName, "encrypt", `cannot encrypt ${describeAttributeValue(node)}`));
  }

  try {
    const ciphertext = await encryptor.encrypt(encoder.encode(text), context);
    return ok({ B: ciphertext });
  } catch (e) {
    return err(createEncryptionError(field.sourceName, "encrypt", "encryptor failed", e));
  }
};

/**
 * Decrypts a stored `B` node back to the `S` or `N` node the field's codec
 * reads.
 */
export const decryptNode = async (
  node: AttributeValue,
  field: FieldDescriptor,
  context: FieldEncryptionContext,
  encryptor: FieldEncryptor | undefined,
): Promise<Result<AttributeValue, EncryptionError>> => {
  if (encryptor === undefined) {
    return err(createEncryptionError(field.sourceName, "decrypt", "no field encryptor is configured"));
  }
  if (!("B" in node)) {
    return err(createEncryptionError(field.sourceName, "decrypt", `expected Binary ciphertext, got ${describeAttributeValue(node)}`));
  }

  try {
    const text = decoder.decode(await encryptor.decrypt(node.B, context));
    return ok(isNumericField(field) ? { N: text } : { S: text });
  } catch (e) {
    return err(createEncryptionError(field.sourceName, "decrypt", "encryptor failed", e));
  }
};
