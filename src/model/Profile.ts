import { utf8ToBytes } from "@noble/hashes/utils";
import { z } from "zod";
import { CHAR_CLASSES, SP_CONSTANTS } from "../constants";
import { FramingError } from "../errors";
import type { AlgorithmVersion, CharClass, Profile } from "../types";
import { err, ok, type Result } from "../utils/result";

const { PROFILE } = SP_CONSTANTS;

function isSupportedVersion(value: unknown): value is AlgorithmVersion {
  return SP_CONSTANTS.SUPPORTED_ALGORITHM_VERSIONS.some((version) => version === value);
}

export const charClassSchema = z.enum(["lower", "upper", "digit", "symbol"]);

export const profileSchema = z
  .object({
    siteLabel: z
      .string()
      .min(1, "must be a non-empty string")
      .refine((label) => utf8ToBytes(label).length <= PROFILE.MAX_SITE_LABEL_BYTES, {
        message: `must be at most ${PROFILE.MAX_SITE_LABEL_BYTES} UTF-8 bytes`
      }),
    length: z.number().int().min(PROFILE.MIN_LENGTH).max(PROFILE.MAX_LENGTH),
    classes: z.union([z.array(charClassSchema), z.set(charClassSchema)]),
    counter: z.number().int().min(0).max(PROFILE.MAX_COUNTER).default(0),
    version: z
      .custom<AlgorithmVersion>(isSupportedVersion, "must be a supported algorithm version")
      .default(SP_CONSTANTS.CURRENT_ALGORITHM_VERSION)
  })
  .strict()
  .transform((input, ctx): Profile => {
    const chosen = new Set<CharClass>(input.classes);
    const classes = CHAR_CLASSES.filter((c) => chosen.has(c));

    if (classes.length === 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["classes"], message: "must not be empty" });
      return z.NEVER;
    }
    if (input.length < classes.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["length"],
        message: `must be at least the number of classes (${classes.length})`
      });
      return z.NEVER;
    }

    return Object.freeze({
      siteLabel: input.siteLabel,
      length: input.length,
      classes: Object.freeze(classes),
      counter: input.counter,
      version: input.version
    });
  });

export type ProfileInput = z.input<typeof profileSchema>;

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "profile"} ${issue.message}`)
    .join("; ");
}

/**
 * Validates and canonicalizes a profile: classes are deduplicated and put in
 * canonical order, defaults are filled in and the result is frozen.
 */
export function parseProfile(input: unknown): Result<Profile, FramingError> {
  const parsed = profileSchema.safeParse(input);
  if (!parsed.success) {
    return err(new FramingError(`Invalid profile: ${describeIssues(parsed.error)}`));
  }
  return ok(parsed.data);
}

/**
 * Builds a profile for `siteLabel` with the library defaults: 16 characters,
 * every class, counter 0, current algorithm version.
 */
export function createProfile(
  siteLabel: string,
  overrides: Partial<Omit<ProfileInput, "siteLabel">> = {}
): Result<Profile, FramingError> {
  return parseProfile({
    siteLabel,
    length: PROFILE.DEFAULT_LENGTH,
    classes: [...CHAR_CLASSES],
    ...overrides
  });
}

/** Same site, next revision: used after a breach to rotate one password. */
export function nextRevision(profile: Profile): Result<Profile, FramingError> {
  return parseProfile({ ...profile, classes: [...profile.classes], counter: profile.counter + 1 });
}
