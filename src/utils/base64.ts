import { ValidationError } from "../errors";

const MAX_BASE64_LEN = 64 * 1024;

export function bytesToBase64(bytes: Uint8Array): string {
  if (bytes.byteLength === 0) return "";
  let binary = "";
  for (let i = 0; i < bytes.length; i++) binary += String.fromCharCode(bytes[i] ?? 0);
  return btoa(binary);
}

export function base64ToBytes(b64: string): Uint8Array {
  if (typeof b64 !== "string" || b64.trim().length === 0) {
    throw new ValidationError("Base64 input must be a non-empty string");
  }

  // normalize: remove whitespace, convert URL-safe to standard, add padding
  const cleaned = b64.replace(/\s+/g, "").replace(/-/g, "+").replace(/_/g, "/");
  if (cleaned.length > MAX_BASE64_LEN) {
    throw new ValidationError("Base64 input too large");
  }
  const pad = cleaned.length % 4;
  const normalized = pad === 0 ? cleaned : cleaned + "=".repeat(4 - pad);

  let binary: string;
  try {
    binary = atob(normalized);
  } catch {
    throw new ValidationError("Invalid base64 input");
  }
  const out = new Uint8Array(binary.length);
  for (let i = 0; i < binary.length; i++) out[i] = binary.charCodeAt(i);
  return out;
}
