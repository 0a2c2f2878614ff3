import { z } from "zod";
import { SP_CONSTANTS } from "../constants";
import { ValidationError } from "../errors";
import { charClassSchema, parseProfile } from "../model/Profile";
import type { Installation, InstallationRecord, Profile, ProfileRecord } from "../types";
import { base64ToBytes, bytesToBase64 } from "../utils/base64";
import { safeParseJson } from "../utils/json";
import { err, ok, type Result } from "../utils/result";

// Field layout of what the storage collaborator persists. The library only
// turns records into strings and back; it never reads or writes storage.

const installationRecordSchema = z
  .object({
    v: z.literal(SP_CONSTANTS.RECORD_VERSION),
    salt: z.string().min(1),
    verifier: z.string().min(1)
  })
  .strict();

const profileRecordSchema = z
  .object({
    v: z.literal(SP_CONSTANTS.RECORD_VERSION),
    siteLabel: z.string(),
    length: z.number(),
    classes: z.array(charClassSchema),
    counter: z.number(),
    algorithm: z.literal(SP_CONSTANTS.CURRENT_ALGORITHM_VERSION)
  })
  .strict();

function schemaError(what: string, error: z.ZodError): ValidationError {
  const first = error.issues[0];
  const where = first && first.path.length > 0 ? ` at ${first.path.join(".")}` : "";
  return new ValidationError(`Invalid ${what} record${where}: ${first?.message ?? "malformed"}`);
}

function decodeBytes(b64: string, expected: number, field: string): Uint8Array {
  const bytes = base64ToBytes(b64);
  if (bytes.length !== expected) {
    throw new ValidationError(`${field} must decode to ${expected} bytes`);
  }
  return bytes;
}

export function toInstallationRecord(installation: Installation): InstallationRecord {
  return {
    v: SP_CONSTANTS.RECORD_VERSION,
    salt: bytesToBase64(installation.salt),
    verifier: bytesToBase64(installation.verifier)
  };
}

export function encodeInstallation(installation: Installation): string {
  return JSON.stringify(toInstallationRecord(installation));
}

export function decodeInstallation(serialized: string): Result<Installation, ValidationError> {
  try {
    const parsed = installationRecordSchema.safeParse(safeParseJson(serialized));
    if (!parsed.success) return err(schemaError("installation", parsed.error));
    return ok(
      Object.freeze({
        salt: decodeBytes(parsed.data.salt, SP_CONSTANTS.SALT_LEN, "salt"),
        verifier: decodeBytes(parsed.data.verifier, SP_CONSTANTS.VERIFIER_LEN, "verifier")
      })
    );
  } catch (e) {
    if (e instanceof ValidationError) return err(e);
    throw e;
  }
}

export function toProfileRecord(profile: Profile): ProfileRecord {
  return {
    v: SP_CONSTANTS.RECORD_VERSION,
    siteLabel: profile.siteLabel,
    length: profile.length,
    classes: [...profile.classes],
    counter: profile.counter,
    algorithm: profile.version
  };
}

export function encodeProfile(profile: Profile): string {
  return JSON.stringify(toProfileRecord(profile));
}

export function encodeProfiles(profiles: readonly Profile[]): string {
  return JSON.stringify(profiles.map(toProfileRecord));
}

function fromProfileRecord(raw: unknown, where: string): Result<Profile, ValidationError> {
  const parsed = profileRecordSchema.safeParse(raw);
  if (!parsed.success) return err(schemaError(where, parsed.error));

  const { siteLabel, length, classes, counter, algorithm } = parsed.data;
  const profile = parseProfile({ siteLabel, length, classes, counter, version: algorithm });
  if (!profile.ok) return err(new ValidationError(`Invalid ${where} record: ${profile.error.message}`));
  return profile;
}

export function decodeProfile(serialized: string): Result<Profile, ValidationError> {
  try {
    return fromProfileRecord(safeParseJson(serialized), "profile");
  } catch (e) {
    if (e instanceof ValidationError) return err(e);
    throw e;
  }
}

/** Decodes a JSON array of profile records; the first bad entry fails the whole list. */
export function decodeProfiles(serialized: string): Result<Profile[], ValidationError> {
  let raw: unknown;
  try {
    raw = safeParseJson(serialized);
  } catch (e) {
    if (e instanceof ValidationError) return err(e);
    throw e;
  }
  if (!Array.isArray(raw)) return err(new ValidationError("Profile list must be a JSON array"));

  const profiles: Profile[] = [];
  for (const [index, entry] of raw.entries()) {
    const profile = fromProfileRecord(entry, `profile[${index}]`);
    if (!profile.ok) return profile;
    profiles.push(profile.value);
  }
  return ok(profiles);
}
