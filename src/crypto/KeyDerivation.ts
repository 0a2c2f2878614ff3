import { argon2id, argon2idAsync } from "@noble/hashes/argon2";
import { SP_CONSTANTS } from "../constants";
import { DerivationError } from "../errors";
import { moduleLogger } from "../logging/logger";
import type { Argon2Params } from "../types";
import { err, ok, type Result } from "../utils/result";

const log = moduleLogger("kdf");
const LIMITS = SP_CONSTANTS.ARGON2_LIMITS;

// Argon2 version 0x13, pinned so a library default can never drift underneath us
const ARGON2_VERSION = 0x13;

function isIntIn(value: number, min: number, max: number): boolean {
  return Number.isInteger(value) && value >= min && value <= max;
}

function checkInputs(
  framed: Uint8Array,
  salt: Uint8Array,
  outputLen: number,
  params: Argon2Params
): DerivationError | null {
  if (!(framed instanceof Uint8Array) || framed.length === 0) {
    return new DerivationError("ParameterInvalid", "KDF input must be a non-empty Uint8Array");
  }
  if (!(salt instanceof Uint8Array) || salt.length < LIMITS.MIN_SALT_LEN) {
    return new DerivationError("ParameterInvalid", `Salt must be a Uint8Array of at least ${LIMITS.MIN_SALT_LEN} bytes`);
  }
  if (!isIntIn(outputLen, LIMITS.MIN_OUTPUT_LEN, LIMITS.MAX_OUTPUT_LEN)) {
    return new DerivationError(
      "ParameterInvalid",
      `outputLen must be an integer in [${LIMITS.MIN_OUTPUT_LEN}, ${LIMITS.MAX_OUTPUT_LEN}]`
    );
  }
  const { iterations, memoryKib, parallelism } = params;
  if (!isIntIn(iterations, 1, LIMITS.MAX_U32)) {
    return new DerivationError("ParameterInvalid", "iterations must be a positive 32-bit integer");
  }
  if (!isIntIn(parallelism, 1, LIMITS.MAX_PARALLELISM)) {
    return new DerivationError("ParameterInvalid", `parallelism must be an integer in [1, ${LIMITS.MAX_PARALLELISM}]`);
  }
  if (!isIntIn(memoryKib, 8 * parallelism, LIMITS.MAX_U32)) {
    return new DerivationError("ParameterInvalid", "memoryKib must be an integer of at least 8 * parallelism");
  }
  return null;
}

function toArgonOpts(outputLen: number, params: Argon2Params) {
  return {
    t: params.iterations,
    m: params.memoryKib,
    p: params.parallelism,
    version: ARGON2_VERSION,
    dkLen: outputLen
  };
}

function checkOutput(out: Uint8Array, outputLen: number): Result<Uint8Array, DerivationError> {
  if (!(out instanceof Uint8Array) || out.length !== outputLen) {
    return err(new DerivationError("ParameterInvalid", `Argon2 returned invalid output size (expected ${outputLen} bytes)`));
  }
  return ok(out);
}

function primitiveFailure(e: unknown): DerivationError {
  const message = e instanceof Error ? e.message : String(e);
  log.error({ err: e }, "argon2 rejected parameters");
  return new DerivationError("ParameterInvalid", `Argon2 derivation failed: ${message}`);
}

/**
 * Stretches `framed` into `outputLen` pseudorandom bytes with Argon2id.
 *
 * Blocking; the cost is whatever `params` says. Every parameter is passed
 * explicitly so output never depends on library defaults.
 */
export function deriveBytes(
  framed: Uint8Array,
  salt: Uint8Array,
  outputLen: number,
  params: Argon2Params
): Result<Uint8Array, DerivationError> {
  const invalid = checkInputs(framed, salt, outputLen, params);
  if (invalid) return err(invalid);

  const started = Date.now();
  let out: Uint8Array;
  try {
    out = argon2id(framed, salt, toArgonOpts(outputLen, params));
  } catch (e) {
    return err(primitiveFailure(e));
  }
  log.debug({ outputLen, memoryKib: params.memoryKib, iterations: params.iterations, ms: Date.now() - started }, "kdf done");
  return checkOutput(out, outputLen);
}

/**
 * Same bytes as {@link deriveBytes}, but Argon2 periodically yields to the
 * event loop so an interactive caller stays responsive. Not cancellable:
 * a caller that gives up simply drops the promise.
 */
export async function deriveBytesAsync(
  framed: Uint8Array,
  salt: Uint8Array,
  outputLen: number,
  params: Argon2Params
): Promise<Result<Uint8Array, DerivationError>> {
  const invalid = checkInputs(framed, salt, outputLen, params);
  if (invalid) return err(invalid);

  const started = Date.now();
  let out: Uint8Array;
  try {
    out = await argon2idAsync(framed, salt, { ...toArgonOpts(outputLen, params), asyncTick: 10 });
  } catch (e) {
    return err(primitiveFailure(e));
  }
  log.debug({ outputLen, memoryKib: params.memoryKib, iterations: params.iterations, ms: Date.now() - started }, "kdf done");
  return checkOutput(out, outputLen);
}
