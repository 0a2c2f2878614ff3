import { State, type SessionStatus } from "./BaseState";
import type { SitePass } from "../SitePass";
import { UnlockedState } from "./UnlockedState";
import type { DerivePasswordError } from "../derive";
import { unlock } from "../../model/Installation";
import { type AuthError, LockedError, StateError } from "../../errors";
import type { Installation, SecretInput } from "../../types";
import { secretToBytes } from "../../utils/bytes";
import { err, ok, type Result } from "../../utils/result";

export class LockedState extends State {
  readonly status: SessionStatus = "locked";

  constructor(context: SitePass, private readonly installation: Installation) {
    super(context);
  }

  setup(_secret: SecretInput): Result<Installation, StateError> {
    return err(new StateError("Already set up"));
  }

  unlock(secret: SecretInput): Result<void, AuthError> {
    const checked = unlock(secret, this.installation.salt, this.installation.verifier);
    if (!checked.ok) return checked;

    this.transitionTo(new UnlockedState(this.context, secretToBytes(secret)));
    return ok(undefined);
  }

  lock(): void {
    // No-op
  }

  derivePassword(_profile: unknown): Result<string, DerivePasswordError | LockedError> {
    return err(new LockedError());
  }

  async derivePasswordAsync(profile: unknown): Promise<Result<string, DerivePasswordError | LockedError>> {
    return this.derivePassword(profile);
  }
}
