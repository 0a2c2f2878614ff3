import { State, type SessionStatus } from "./BaseState";
import { UnlockedState } from "./UnlockedState";
import type { DerivePasswordError } from "../derive";
import { createInstallation } from "../../model/Installation";
import { LockedError, StateError, type ValidationError } from "../../errors";
import type { Installation, SecretInput } from "../../types";
import { secretToBytes } from "../../utils/bytes";
import { err, ok, type Result } from "../../utils/result";

/** First run: no salt or verifier exists yet. */
export class SetupState extends State {
  readonly status: SessionStatus = "setup";

  setup(secret: SecretInput): Result<Installation, ValidationError> {
    const created = createInstallation(secret, this.context.random);
    if (!created.ok) return created;

    this.context.installation = created.value;
    this.transitionTo(new UnlockedState(this.context, secretToBytes(secret)));
    return ok(created.value);
  }

  unlock(_secret: SecretInput): Result<void, StateError> {
    return err(new StateError("No installation yet; call setup() first"));
  }

  lock(): void {
    // No-op
  }

  derivePassword(_profile: unknown): Result<string, DerivePasswordError | LockedError> {
    return err(new LockedError("Setup required before deriving passwords"));
  }

  async derivePasswordAsync(profile: unknown): Promise<Result<string, DerivePasswordError | LockedError>> {
    return this.derivePassword(profile);
  }
}
