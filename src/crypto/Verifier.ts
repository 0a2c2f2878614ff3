import { sha256 } from "@noble/hashes/sha2";
import { concatBytes, utf8ToBytes } from "@noble/hashes/utils";
import { timingSafeEqual } from "node:crypto";
import { SP_CONSTANTS } from "../constants";
import { ValidationError } from "../errors";
import type { SecretInput } from "../types";
import { secretToBytes, wipe } from "../utils/bytes";

const VERIFIER_TAG = utf8ToBytes(SP_CONSTANTS.VERIFIER_TAG);

function assertSalt(salt: Uint8Array): void {
  if (!(salt instanceof Uint8Array) || salt.length !== SP_CONSTANTS.SALT_LEN) {
    throw new ValidationError(`Salt must be Uint8Array of length ${SP_CONSTANTS.SALT_LEN}`);
  }
}

/**
 * `SHA-256(secret || salt || tag)`. The salt has a fixed length, so the
 * concatenation is unambiguous. Fast on purpose: it gates unlocking, while
 * Argon2 guards the passwords themselves.
 *
 * @throws {@link ValidationError} on an empty secret or a malformed salt.
 */
export function makeVerifier(secret: SecretInput, salt: Uint8Array): Uint8Array {
  assertSalt(salt);
  const bytes = secretToBytes(secret);
  if (bytes.length === 0) {
    throw new ValidationError("Master secret must be non-empty");
  }
  const input = concatBytes(bytes, salt, VERIFIER_TAG);
  try {
    return sha256(input);
  } finally {
    wipe(bytes);
    wipe(input);
  }
}

/** Constant-time comparison against a stored verifier; `false` for any malformed input. */
export function checkVerifier(secret: SecretInput, salt: Uint8Array, stored: Uint8Array): boolean {
  let actual: Uint8Array;
  try {
    actual = makeVerifier(secret, salt);
  } catch (e) {
    if (e instanceof ValidationError) return false;
    throw e;
  }
  if (!(stored instanceof Uint8Array) || stored.length !== actual.length) {
    return false;
  }
  return timingSafeEqual(actual, stored);
}
