import { concatBytes, utf8ToBytes } from "@noble/hashes/utils";
import { CLASS_BITS, SP_CONSTANTS } from "../constants";
import { FramingError } from "../errors";
import { parseProfile } from "../model/Profile";
import type { CharClass } from "../types";
import { lengthPrefixed, u32be, wipe } from "../utils/bytes";
import { err, ok, type Result } from "../utils/result";

const FRAME_TAG = utf8ToBytes(SP_CONSTANTS.FRAME_TAG);

export function classSignature(classes: readonly CharClass[]): number {
  return classes.reduce((mask, c) => mask | CLASS_BITS[c], 0);
}

/**
 * Canonical KDF input for one (secret, profile) pair.
 *
 * Layout (algorithm version 1):
 * ```
 * u8 len(tag) | tag | u8 version
 * u32be len(secret) | secret
 * u32be len(label) | label (UTF-8)
 * u32be counter | u8 length | u8 class bitmask
 * ```
 * Variable-length fields carry a length prefix, so distinct profiles can
 * never frame to the same bytes. The returned buffer holds the secret: wipe
 * it once the KDF has consumed it.
 */
export function frame(secret: Uint8Array, profile: unknown): Result<Uint8Array, FramingError> {
  const parsed = parseProfile(profile);
  if (!parsed.ok) return parsed;

  if (!(secret instanceof Uint8Array) || secret.length === 0) {
    return err(new FramingError("Master secret must be a non-empty byte sequence"));
  }

  const { siteLabel, counter, length, classes, version } = parsed.value;
  const secretField = lengthPrefixed(secret);
  try {
    return ok(
      concatBytes(
        Uint8Array.of(FRAME_TAG.length),
        FRAME_TAG,
        Uint8Array.of(version),
        secretField,
        lengthPrefixed(utf8ToBytes(siteLabel)),
        u32be(counter),
        Uint8Array.of(length, classSignature(classes))
      )
    );
  } finally {
    wipe(secretField);
  }
}
