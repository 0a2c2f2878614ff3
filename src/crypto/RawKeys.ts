import { utf8ToBytes } from "@noble/hashes/utils";
import { DerivationError } from "../errors";
import type { Argon2Params, SecretInput } from "../types";
import { bytesToBase64 } from "../utils/base64";
import { secretToBytes, wipe } from "../utils/bytes";
import { err, ok, type Result } from "../utils/result";
import { deriveBytes } from "./KeyDerivation";

export type RawKeyFormat = "base64-256" | "base64-512" | "digits-4" | "digits-6";

export const RAW_KEY_FORMATS: readonly RawKeyFormat[] = ["base64-256", "base64-512", "digits-4", "digits-6"];

/** Classic Argon2id cost (m = 19 MiB, t = 2, p = 1). Frozen: raw keys are pinned to it. */
export const RAW_KEY_ARGON2: Readonly<Argon2Params> = {
  iterations: 2,
  memoryKib: 19 * 1024,
  parallelism: 1
};

const FORMAT_BYTES: Readonly<Record<RawKeyFormat, number>> = {
  "base64-256": 32,
  "base64-512": 64,
  "digits-4": 32,
  "digits-6": 32
};

/** Big-endian fold of `key` modulo 10^n, zero-padded to n digits. */
export function digits(key: Uint8Array, n: number): string {
  const modulus = 10 ** n;
  let rest = 0;
  for (const byte of key) rest = (rest * 256 + byte) % modulus;
  return rest.toString().padStart(n, "0");
}

function render(key: Uint8Array, format: RawKeyFormat): string {
  switch (format) {
    case "base64-256":
    case "base64-512":
      return bytesToBase64(key);
    case "digits-4":
      return digits(key, 4);
    case "digits-6":
      return digits(key, 6);
  }
}

/**
 * Argon2id key over `(secret, context)` rendered as base64 or a numeric PIN.
 *
 * `context` (a site or account name, at least 8 bytes) is used directly as
 * the Argon2 salt; no installation salt or profile is involved.
 */
export function deriveRawKey(
  secret: SecretInput,
  context: string | Uint8Array,
  format: RawKeyFormat
): Result<string, DerivationError> {
  if (!RAW_KEY_FORMATS.includes(format)) {
    return err(new DerivationError("ParameterInvalid", `Unknown raw key format: ${String(format)}`));
  }
  const password = secretToBytes(secret);
  if (password.length === 0) {
    return err(new DerivationError("ParameterInvalid", "Master secret must be non-empty"));
  }
  const salt = typeof context === "string" ? utf8ToBytes(context) : context;

  try {
    const derived = deriveBytes(password, salt, FORMAT_BYTES[format], RAW_KEY_ARGON2);
    if (!derived.ok) return derived;
    const key = derived.value;
    try {
      return ok(render(key, format));
    } finally {
      wipe(key);
    }
  } finally {
    wipe(password);
  }
}
