/**
 * Stateful session over the derivation core.
 *
 * @packageDocumentation
 *
 * @remarks
 * - Lifecycle: `setup` (no installation yet) → `unlocked`, and
 *   `locked` → {@link SitePass.unlock} → `unlocked` → {@link SitePass.lock} → `locked`.
 *   Whenever an installation exists, the only way to `unlocked` is through
 *   the verifier check.
 *
 * - The session is a plain value owned by the caller; the library keeps no
 *   process-wide state. While unlocked it holds a private copy of the master
 *   secret, zero-filled on {@link SitePass.lock}.
 *
 * - Error taxonomy (returned as {@link Result} values, never thrown):
 *   - {@link FramingError}: malformed profile.
 *   - {@link DerivationError}: KDF parameter problem or exhausted entropy buffer.
 *   - {@link AuthError}: wrong master secret.
 *   - {@link LockedError}: derivation attempted while locked or before setup.
 *   - {@link StateError}: setup/unlock called in a state that does not allow it.
 *   - {@link ValidationError}: bad setup input (empty secret, broken random source).
 */

import type { RandomSource } from "../crypto/RandomSource";
import type { AuthError, LockedError, StateError, ValidationError } from "../errors";
import type { Installation, SecretInput } from "../types";
import type { Result } from "../utils/result";
import type { DerivePasswordError } from "./derive";
import { State, type SessionStatus } from "./states/BaseState";
import { LockedState } from "./states/LockedState";
import { SetupState } from "./states/SetupState";

/**
 * Configuration for {@link SitePass}.
 */
export interface SitePassOptions {
  /**
   * Salt and verifier loaded from the caller's storage. Omit (or pass `null`)
   * on first run; the session then starts in `setup`.
   */
  installation?: Installation | null;

  /**
   * Source of the installation salt. Required so that tests can inject a
   * deterministic source; use {@link secureRandom} in production.
   */
  random: RandomSource;
}

/**
 * @example
 * ```typescript
 * // First run
 * const session = new SitePass({ random: secureRandom });
 * const created = session.setup("correct horse battery staple");
 * if (created.ok) save(encodeInstallation(created.value));
 *
 * // Later runs
 * const restored = new SitePass({ installation, random: secureRandom });
 * restored.unlock("correct horse battery staple");
 * const pw = restored.derivePassword({ siteLabel: "example.com", length: 16, classes: ["lower", "digit"] });
 * restored.lock();
 * ```
 */
export class SitePass {
  /** @internal Backing state machine (Setup|Locked → Unlocked → Locked). */
  private state: State;

  /** @internal Current salt and verifier; `null` until setup completes. */
  public installation: Installation | null;

  /** @internal */
  public readonly random: RandomSource;

  constructor(opts: SitePassOptions) {
    this.random = opts.random;
    this.installation = opts.installation ?? null;
    this.state = this.installation ? new LockedState(this, this.installation) : new SetupState(this);
  }

  /** @internal State transition helper (do not call directly). */
  public transitionTo(state: State): void {
    this.state = state;
  }

  public get status(): SessionStatus {
    return this.state.status;
  }

  /** `true` unless the session is unlocked (first-run `setup` counts as locked). */
  public isLocked(): boolean {
    return this.state.status !== "unlocked";
  }

  /** Salt and verifier to persist; `null` before setup. */
  public getInstallation(): Installation | null {
    return this.installation;
  }

  /**
   * Creates the installation for `secret` and leaves the session unlocked.
   * Only valid in the `setup` state.
   */
  public setup(secret: SecretInput): Result<Installation, ValidationError | StateError> {
    return this.state.setup(secret);
  }

  /**
   * Verifies `secret` against the installation verifier. On success the
   * session holds a copy of the secret until {@link lock}.
   */
  public unlock(secret: SecretInput): Result<void, AuthError | StateError> {
    return this.state.unlock(secret);
  }

  /** Discards the held secret. No effect when already locked. */
  public lock(): void {
    this.state.lock();
  }

  /** Derives the password for `profile` with the held secret and the installation salt. */
  public derivePassword(profile: unknown): Result<string, DerivePasswordError | LockedError> {
    return this.state.derivePassword(profile);
  }

  /**
   * Event-loop friendly {@link derivePassword}. If the session is locked
   * before Argon2 finishes, the result is dropped and a {@link LockedError}
   * returned instead.
   */
  public derivePasswordAsync(profile: unknown): Promise<Result<string, DerivePasswordError | LockedError>> {
    return this.state.derivePasswordAsync(profile);
  }
}
