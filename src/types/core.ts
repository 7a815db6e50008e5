/**
 * Result type used across the bootstrap for explicit error handling.
 *
 * Infrastructure clients and steps never throw for expected failures; they
 * return a `Failure` carrying a message and optional guidance for the operator.
 */

/**
 * Operator-facing guidance attached to a failure.
 */
export interface ErrorGuidance {
  /** Short description of what went wrong */
  message?: string;
  /** Likely cause */
  hint?: string;
  /** What the operator can do about it */
  resolution?: string;
  /** Structured context (command output, failure kind, ...) */
  details?: Record<string, unknown>;
}

export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: string; guidance?: ErrorGuidance };

export function Success<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function Failure<T = never>(error: string, guidance?: ErrorGuidance): Result<T> {
  return guidance ? { ok: false, error, guidance } : { ok: false, error };
}

export function isSuccess<T>(result: Result<T>): result is { ok: true; value: T } {
  return result.ok;
}
