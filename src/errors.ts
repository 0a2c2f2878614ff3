export class SitePassError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SitePassError";
  }
}

export class ValidationError extends SitePassError {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

/** Malformed profile or secret, rejected before any hashing happens. */
export class FramingError extends SitePassError {
  constructor(message: string) {
    super(message);
    this.name = "FramingError";
  }
}

export type DerivationErrorCode = "ParameterInvalid" | "BufferExhausted";

export class DerivationError extends SitePassError {
  constructor(
    public readonly code: DerivationErrorCode,
    message: string
  ) {
    super(message);
    this.name = "DerivationError";
  }
}

export type AuthErrorCode = "SecretMismatch";

export class AuthError extends SitePassError {
  public readonly code: AuthErrorCode = "SecretMismatch";

  constructor(message = "Invalid master secret") {
    super(message);
    this.name = "AuthError";
  }
}

export class LockedError extends SitePassError {
  constructor(message = "Session locked") {
    super(message);
    this.name = "LockedError";
  }
}

export class StateError extends SitePassError {
  constructor(message: string) {
    super(message);
    this.name = "StateError";
  }
}
