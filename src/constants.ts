import type { AlgorithmSpec, AlgorithmVersion, CharClass } from "./types";

export const SP_CONSTANTS = {
  CURRENT_ALGORITHM_VERSION: 1 as const,
  SUPPORTED_ALGORITHM_VERSIONS: [1] as const,

  // Installation salt, fixed so records stay portable
  SALT_LEN: 32,

  PROFILE: {
    MIN_LENGTH: 4,
    MAX_LENGTH: 64,
    DEFAULT_LENGTH: 16,
    MAX_COUNTER: 0xffffffff,
    MAX_SITE_LABEL_BYTES: 1024
  },

  // Domain-separation tags. Changing either is a breaking change.
  FRAME_TAG: "sitepass-frame",
  VERIFIER_TAG: "sitepass-verifier-v1",
  VERIFIER_LEN: 32, // SHA-256

  // Limits imposed by Argon2 itself (RFC 9106 section 3.1)
  ARGON2_LIMITS: {
    MIN_OUTPUT_LEN: 4,
    MAX_OUTPUT_LEN: 0xffffffff,
    MIN_SALT_LEN: 8,
    MAX_PARALLELISM: 0xffffff,
    MAX_U32: 0xffffffff
  },

  // Persistence record format
  RECORD_VERSION: 1 as const
};

/** Canonical class order: alphabet concatenation, bitmask and repair order all follow it. */
export const CHAR_CLASSES: readonly CharClass[] = ["lower", "upper", "digit", "symbol"];

export const CLASS_BITS: Readonly<Record<CharClass, number>> = {
  lower: 0x01,
  upper: 0x02,
  digit: 0x04,
  symbol: 0x08
};

/**
 * Frozen parameter sets, one per algorithm version. Passwords are only
 * reproducible while the set a profile names stays untouched: tune by adding
 * a version, never by editing one.
 */
export const ALGORITHMS: Readonly<Record<AlgorithmVersion, AlgorithmSpec>> = {
  1: {
    version: 1,
    argon2: {
      iterations: 3,
      memoryKib: 64 * 1024,
      parallelism: 1
    },
    // 64 characters plus four repairs need well under 100 accepted bytes
    outputLen: 256,
    alphabets: {
      lower: "abcdefghijklmnopqrstuvwxyz",
      upper: "ABCDEFGHIJKLMNOPQRSTUVWXYZ",
      digit: "0123456789",
      symbol: "!\"#$%&'()*+,-./:;<=>?@[\\]^_`{|}~"
    }
  }
};
