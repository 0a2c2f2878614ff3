import { randomBytes } from "@noble/hashes/utils";

/**
 * Source of salt bytes. Always passed in explicitly so tests can supply a
 * deterministic stand-in; production code should use {@link secureRandom}.
 */
export interface RandomSource {
  bytes(length: number): Uint8Array;
}

/** CSPRNG backed by the platform's `crypto.getRandomValues`. */
export const secureRandom: RandomSource = {
  bytes: (length) => randomBytes(length)
};
