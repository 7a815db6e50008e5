/**
 * Readiness polling with optional backoff and deadline.
 */

import { extractErrorMessage } from './errors';

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Resolves after `ms`, or as soon as `signal` aborts.
 */
export const sleep: Sleep = (ms, signal) =>
  new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });

export interface PollOptions {
  /** Delay before the second attempt */
  intervalMs: number;
  /** Attempt budget, including the first attempt */
  maxAttempts: number;
  /** Overall deadline measured from the first attempt */
  timeoutMs?: number;
  /** Multiplier applied to the delay after each attempt (default 1) */
  backoffFactor?: number;
  /** Upper bound for the delay when backing off */
  maxIntervalMs?: number;
  signal?: AbortSignal;
  sleep?: Sleep;
  now?: () => number;
}

export type PollOutcome =
  | { ready: true; attempts: number; elapsedMs: number }
  | {
      ready: false;
      reason: 'timeout' | 'aborted';
      attempts: number;
      elapsedMs: number;
      lastError?: string;
    };

/**
 * Call `predicate` until it returns true or the budget runs out.
 *
 * A predicate that throws counts as "not ready yet"; the last message is kept
 * in the outcome.
 */
export async function pollUntil(
  predicate: () => Promise<boolean>,
  options: PollOptions,
): Promise<PollOutcome> {
  const wait = options.sleep ?? sleep;
  const now = options.now ?? Date.now;
  const factor = options.backoffFactor ?? 1;
  const startedAt = now();

  let delayMs = options.intervalMs;
  let attempts = 0;
  let lastError: string | undefined;

  const notReady = (reason: 'timeout' | 'aborted'): PollOutcome => ({
    ready: false,
    reason,
    attempts,
    elapsedMs: now() - startedAt,
    ...(lastError !== undefined && { lastError }),
  });

  while (attempts < options.maxAttempts) {
    if (options.signal?.aborted) {
      return notReady('aborted');
    }

    attempts++;
    try {
      if (await predicate()) {
        return { ready: true, attempts, elapsedMs: now() - startedAt };
      }
      lastError = undefined;
    } catch (error) {
      lastError = extractErrorMessage(error);
    }

    if (attempts >= options.maxAttempts) {
      break;
    }
    if (options.timeoutMs !== undefined && now() - startedAt + delayMs > options.timeoutMs) {
      break;
    }

    await wait(delayMs, options.signal);
    delayMs =
      options.maxIntervalMs !== undefined
        ? Math.min(delayMs * factor, options.maxIntervalMs)
        : delayMs * factor;
  }

  return notReady('timeout');
}
