import type { SitePass } from "../SitePass";
import type { DerivePasswordError } from "../derive";
import type { AuthError, LockedError, StateError, ValidationError } from "../../errors";
import type { Installation, SecretInput } from "../../types";
import type { Result } from "../../utils/result";

export type SessionStatus = "setup" | "locked" | "unlocked";

export abstract class State {
  constructor(protected context: SitePass) {}

  abstract readonly status: SessionStatus;
  abstract setup(secret: SecretInput): Result<Installation, ValidationError | StateError>;
  abstract unlock(secret: SecretInput): Result<void, AuthError | StateError>;
  abstract lock(): void;
  abstract derivePassword(profile: unknown): Result<string, DerivePasswordError | LockedError>;
  abstract derivePasswordAsync(profile: unknown): Promise<Result<string, DerivePasswordError | LockedError>>;

  protected transitionTo(state: State): void {
    this.context.transitionTo(state);
  }
}
