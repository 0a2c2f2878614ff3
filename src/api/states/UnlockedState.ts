import { State, type SessionStatus } from "./BaseState";
import type { SitePass } from "../SitePass";
import { LockedState } from "./LockedState";
import { derivePassword, derivePasswordAsync, type DerivePasswordError } from "../derive";
import { unlock } from "../../model/Installation";
import { type AuthError, LockedError, StateError } from "../../errors";
import type { Installation, SecretInput } from "../../types";
import { wipe } from "../../utils/bytes";
import { err, type Result } from "../../utils/result";

/** Holds a private copy of the verified secret until {@link lock}. */
export class UnlockedState extends State {
  readonly status: SessionStatus = "unlocked";

  constructor(context: SitePass, private readonly secret: Uint8Array) {
    super(context);
  }

  private requireInstallation(): Installation {
    const { installation } = this.context;
    if (!installation) {
      throw new StateError("Unlocked session without an installation");
    }
    return installation;
  }

  setup(_secret: SecretInput): Result<Installation, StateError> {
    return err(new StateError("Already set up"));
  }

  /** Re-checks `secret`; the session stays unlocked either way. */
  unlock(secret: SecretInput): Result<void, AuthError> {
    const { salt, verifier } = this.requireInstallation();
    return unlock(secret, salt, verifier);
  }

  lock(): void {
    wipe(this.secret);
    this.transitionTo(new LockedState(this.context, this.requireInstallation()));
  }

  derivePassword(profile: unknown): Result<string, DerivePasswordError | LockedError> {
    return derivePassword(this.secret, profile, this.requireInstallation().salt);
  }

  async derivePasswordAsync(profile: unknown): Promise<Result<string, DerivePasswordError | LockedError>> {
    const { salt } = this.requireInstallation();
    const result = await derivePasswordAsync(this.secret, profile, salt);
    // lock() may have wiped the secret while Argon2 was yielding
    if (this.context.isLocked()) return err(new LockedError("Session locked during derivation"));
    return result;
  }
}
