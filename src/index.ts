import { SitePass, type SitePassOptions } from "./api/SitePass";

export type { SitePassOptions } from "./api/SitePass";
export type { SessionStatus } from "./api/states/BaseState";
export { SitePass } from "./api/SitePass";
export { derivePassword, derivePasswordAsync, type DerivePasswordError } from "./api/derive";
export { createInstallation, unlock } from "./model/Installation";
export { createProfile, nextRevision, parseProfile, type ProfileInput } from "./model/Profile";
export { frame } from "./crypto/Framing";
export { deriveBytes, deriveBytesAsync } from "./crypto/KeyDerivation";
export { encodePassword } from "./crypto/AlphabetEncoder";
export { checkVerifier, makeVerifier } from "./crypto/Verifier";
export { secureRandom, type RandomSource } from "./crypto/RandomSource";
export { deriveRawKey, digits, RAW_KEY_FORMATS, type RawKeyFormat } from "./crypto/RawKeys";
export {
  decodeInstallation,
  decodeProfile,
  decodeProfiles,
  encodeInstallation,
  encodeProfile,
  encodeProfiles
} from "./storage/RecordCodec";
export { ALGORITHMS, CHAR_CLASSES, SP_CONSTANTS } from "./constants";
export * from "./errors";
export type * from "./types";
export { err, ok, unwrap, type Result } from "./utils/result";

/**
 * Creates a new {@link SitePass} session.
 *
 * Shorthand for `new SitePass(opts)`.
 *
 * @example
 * ```typescript
 * import sitePass, { secureRandom } from "sitepass";
 *
 * const session = sitePass({ random: secureRandom });
 * const installation = session.setup("correct horse battery staple");
 * const result = session.derivePassword({
 *   siteLabel: "example.com",
 *   length: 16,
 *   classes: ["lower", "upper", "digit", "symbol"]
 * });
 * if (result.ok) console.log(result.value);
 * session.lock();
 * ```
 */
export default function sitePass(opts: SitePassOptions): SitePass {
  return new SitePass(opts);
}
