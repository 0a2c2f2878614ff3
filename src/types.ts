export type CharClass = "lower" | "upper" | "digit" | "symbol";

export type AlgorithmVersion = 1;

/** Master secret as supplied by the caller; strings are UTF-8 encoded. */
export type SecretInput = string | Uint8Array;

export interface Argon2Params {
  iterations: number;  // t
  memoryKib: number;   // m, in KiB
  parallelism: number; // p
}

export type Alphabets = Readonly<Record<CharClass, string>>;

export interface AlgorithmSpec {
  version: AlgorithmVersion;
  argon2: Readonly<Argon2Params>;
  outputLen: number;   // bytes requested from a single KDF call
  alphabets: Alphabets;
}

/** Per-site generation policy. Treated as read-only by every derivation. */
export interface Profile {
  readonly siteLabel: string;
  readonly length: number;
  readonly classes: readonly CharClass[];
  readonly counter: number;
  readonly version: AlgorithmVersion;
}

/** Salt and verifier pair created once at first setup. */
export interface Installation {
  readonly salt: Uint8Array;
  readonly verifier: Uint8Array;
}

export interface InstallationRecord {
  v: 1;
  salt: string;     // base64
  verifier: string; // base64
}

export interface ProfileRecord {
  v: 1;
  siteLabel: string;
  length: number;
  classes: CharClass[];
  counter: number;
  algorithm: AlgorithmVersion;
}
