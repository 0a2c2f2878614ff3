/**
 * Discriminated union returned by every public operation. Failures are
 * values carrying a {@link SitePassError} subclass; nothing is thrown across
 * the library boundary.
 *
 * @example
 * ```typescript
 * const result = derivePassword(secret, profile, salt);
 * if (result.ok) {
 *   show(result.value);
 * } else if (result.error instanceof FramingError) {
 *   reportBadProfile(result.error.message);
 * }
 * ```
 */
export type Result<T, E> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

/**
 * Returns the value or throws the carried error. Meant for callers (and
 * tests) that prefer exceptions at their own edge.
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.ok) {
    return result.value;
  }
  throw result.error;
}
