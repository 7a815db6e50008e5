/**
 * Error helpers and the failure taxonomy of a bootstrap run.
 */

import { Failure, type ErrorGuidance, type Result } from '@/types';

/**
 * Kinds of failure that terminate a run.
 *
 * Discovery misses and "already exists" responses are not failures and never
 * appear here.
 */
export const FAILURE_KINDS = [
  'dependency-missing',
  'convergence-timeout',
  'command-failed',
  'invalid-config',
  'aborted',
] as const;

export type FailureKind = (typeof FAILURE_KINDS)[number];

export function isFailureKind(value: unknown): value is FailureKind {
  return typeof value === 'string' && (FAILURE_KINDS as readonly string[]).includes(value);
}

/**
 * Extract a readable message from an unknown thrown value.
 */
export function extractErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object' && 'message' in error) {
    if (typeof error.message === 'string') {
      return error.message;
    }
  }
  return String(error);
}

/**
 * Build a failure tagged with its kind so the sequencer can classify it.
 */
export function failWith<T = never>(
  kind: FailureKind,
  error: string,
  guidance: ErrorGuidance = {},
): Result<T> {
  return Failure(error, {
    ...guidance,
    message: guidance.message ?? error,
    details: { ...guidance.details, kind },
  });
}

/**
 * Read the failure kind off a guidance object, defaulting to `command-failed`.
 */
export function failureKindOf(guidance: ErrorGuidance | undefined): FailureKind {
  const kind = guidance?.details?.kind;
  return isFailureKind(kind) ? kind : 'command-failed';
}
