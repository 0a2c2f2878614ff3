import { utf8ToBytes } from "@noble/hashes/utils";
import type { SecretInput } from "../types";

/** Fresh copy owned by the caller, safe to {@link wipe} afterwards. */
export function secretToBytes(secret: SecretInput): Uint8Array {
  return typeof secret === "string" ? utf8ToBytes(secret) : Uint8Array.from(secret);
}

export function wipe(bytes: Uint8Array): void {
  bytes.fill(0);
}

export function u32be(value: number): Uint8Array {
  const out = new Uint8Array(4);
  new DataView(out.buffer).setUint32(0, value, false);
  return out;
}

/** Byte string prefixed by its length as a big-endian u32. */
export function lengthPrefixed(bytes: Uint8Array): Uint8Array {
  const out = new Uint8Array(4 + bytes.length);
  out.set(u32be(bytes.length), 0);
  out.set(bytes, 4);
  return out;
}
