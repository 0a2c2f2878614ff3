import { ALGORITHMS, SP_CONSTANTS } from "../constants";
import { encodePassword } from "../crypto/AlphabetEncoder";
import { frame } from "../crypto/Framing";
import { deriveBytes, deriveBytesAsync } from "../crypto/KeyDerivation";
import { DerivationError, FramingError } from "../errors";
import { moduleLogger } from "../logging/logger";
import { parseProfile } from "../model/Profile";
import type { AlgorithmSpec, Profile, SecretInput } from "../types";
import { secretToBytes, wipe } from "../utils/bytes";
import { err, ok, type Result } from "../utils/result";

const log = moduleLogger("derive");

export type DerivePasswordError = FramingError | DerivationError;

interface Prepared {
  profile: Profile;
  algorithm: AlgorithmSpec;
  framed: Uint8Array;
}

function prepare(secret: SecretInput, profile: unknown, salt: Uint8Array): Result<Prepared, DerivePasswordError> {
  const parsed = parseProfile(profile);
  if (!parsed.ok) return parsed;

  if (!(salt instanceof Uint8Array) || salt.length !== SP_CONSTANTS.SALT_LEN) {
    return err(new DerivationError("ParameterInvalid", `Salt must be Uint8Array of length ${SP_CONSTANTS.SALT_LEN}`));
  }

  const secretBytes = secretToBytes(secret);
  try {
    const framed = frame(secretBytes, parsed.value);
    if (!framed.ok) return framed;
    return ok({ profile: parsed.value, algorithm: ALGORITHMS[parsed.value.version], framed: framed.value });
  } finally {
    wipe(secretBytes);
  }
}

function render(
  prepared: Prepared,
  derived: Result<Uint8Array, DerivationError>,
  started: number
): Result<string, DerivePasswordError> {
  wipe(prepared.framed);
  if (!derived.ok) return derived;

  const { profile, algorithm } = prepared;
  try {
    const password = encodePassword(derived.value, profile.length, profile.classes, algorithm.alphabets);
    if (password.ok) {
      log.debug(
        { version: algorithm.version, length: profile.length, classes: profile.classes.length, ms: Date.now() - started },
        "password derived"
      );
    }
    return password;
  } finally {
    wipe(derived.value);
  }
}

/**
 * Derives the password for `profile`: frame, stretch with Argon2id under the
 * profile's algorithm version, then encode. Synchronous and deterministic;
 * the same inputs always give the same string.
 *
 * @example
 * ```typescript
 * const result = derivePassword("correct horse battery staple", {
 *   siteLabel: "example.com",
 *   length: 16,
 *   classes: ["lower", "upper", "digit", "symbol"],
 *   counter: 0
 * }, installation.salt);
 * if (result.ok) console.log(result.value);
 * ```
 */
export function derivePassword(
  secret: SecretInput,
  profile: unknown,
  salt: Uint8Array
): Result<string, DerivePasswordError> {
  const started = Date.now();
  const prepared = prepare(secret, profile, salt);
  if (!prepared.ok) return prepared;

  const { framed, algorithm } = prepared.value;
  return render(prepared.value, deriveBytes(framed, salt, algorithm.outputLen, algorithm.argon2), started);
}

/** {@link derivePassword} for event-loop driven callers; identical output. */
export async function derivePasswordAsync(
  secret: SecretInput,
  profile: unknown,
  salt: Uint8Array
): Promise<Result<string, DerivePasswordError>> {
  const started = Date.now();
  const prepared = prepare(secret, profile, salt);
  if (!prepared.ok) return prepared;

  const { framed, algorithm } = prepared.value;
  const derived = await deriveBytesAsync(framed, salt, algorithm.outputLen, algorithm.argon2);
  return render(prepared.value, derived, started);
}
