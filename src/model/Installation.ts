import { SP_CONSTANTS } from "../constants";
import { checkVerifier, makeVerifier } from "../crypto/Verifier";
import type { RandomSource } from "../crypto/RandomSource";
import { AuthError, ValidationError } from "../errors";
import { moduleLogger } from "../logging/logger";
import type { Installation, SecretInput } from "../types";
import { err, ok, type Result } from "../utils/result";

const log = moduleLogger("installation");

/**
 * One-time setup: draws a fresh salt from `random` and computes the verifier
 * for `secret`. Persisting the pair is the caller's job.
 */
export function createInstallation(
  secret: SecretInput,
  random: RandomSource
): Result<Installation, ValidationError> {
  let salt: Uint8Array;
  try {
    salt = random.bytes(SP_CONSTANTS.SALT_LEN);
  } catch (e) {
    return err(new ValidationError(`Random source failed: ${e instanceof Error ? e.message : String(e)}`));
  }
  if (!(salt instanceof Uint8Array) || salt.length !== SP_CONSTANTS.SALT_LEN) {
    return err(new ValidationError(`Random source must return ${SP_CONSTANTS.SALT_LEN} bytes`));
  }

  let verifier: Uint8Array;
  try {
    verifier = makeVerifier(secret, salt);
  } catch (e) {
    if (e instanceof ValidationError) return err(e);
    throw e;
  }
  log.info("installation created");
  return ok(Object.freeze({ salt, verifier }));
}

/** Checks `secret` against the stored verifier; the error says nothing beyond "mismatch". */
export function unlock(
  secret: SecretInput,
  salt: Uint8Array,
  verifier: Uint8Array
): Result<void, AuthError> {
  if (!checkVerifier(secret, salt, verifier)) {
    log.warn("unlock rejected");
    return err(new AuthError());
  }
  return ok(undefined);
}
