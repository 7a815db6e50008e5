/**
 * Types of the bootstrap sequencer: steps, plans, run state and reports.
 */

import type { ErrorGuidance, Result } from '@/types';
import type { PollBudget } from '@/config/constants';
import type { FailureKind } from '@/lib/errors';
import type { BootstrapContext } from '@/core/context';

/**
 * How a step ended.
 * - `done`: the action ran
 * - `noop`: the guard found the resource in place, the action did not run
 * - `skipped`: a precondition was missing (file, discovered address); the
 *   run continues with a warning
 */
export type StepStatus = 'done' | 'noop' | 'skipped';

export interface StepReport {
  status: StepStatus;
  message: string;
  warnings?: string[];
}

export interface StepGuard {
  /** Shown when the guard holds, e.g. "Kind cluster cube-studio already exists" */
  description: string;
  check(context: BootstrapContext): Promise<boolean>;
}

export interface Readiness {
  /** Shown while waiting, e.g. "node cube-studio-control-plane to become Ready" */
  description: string;
  check(context: BootstrapContext): Promise<boolean>;
  budget: PollBudget & { timeoutMs?: number };
  /** `fail` aborts the run on timeout, `warn` records a warning and moves on */
  onTimeout: 'fail' | 'warn';
  /** Operator advice attached to a timeout failure */
  resolution?: string;
  /** Poll only when this holds (default: always) */
  when?(context: BootstrapContext): boolean;
}

/**
 * An ordered unit of work.
 *
 * A step is idempotent or guarded. Readiness, when declared, is polled after
 * the action and after a satisfied guard; it is not polled for a skipped step.
 */
export interface Step {
  id: string;
  title: string;
  guard?: StepGuard;
  run(context: BootstrapContext): Promise<Result<StepReport>>;
  readiness?: Readiness;
}

export interface Plan {
  name: 'start' | 'repair';
  title: string;
  steps: readonly Step[];
}

/**
 * Values discovered while the run progresses. Held in memory only.
 */
export interface EnvironmentSnapshot {
  /** Address of the kind node on the kind network */
  nodeAddress?: string;
  mysqlAddress?: string;
  redisAddress?: string;
  /** Kubeconfig written for in-network consumers */
  kubeconfigPath?: string;
  /** Value written to MINIO_HOST */
  minioHost?: string;
  /** Containers attached to the kind network during this run */
  attachedContainers: string[];
  /** Containers restarted during this run */
  restartedContainers: string[];
}

export function createSnapshot(): EnvironmentSnapshot {
  return { attachedContainers: [], restartedContainers: [] };
}

export interface FailedState {
  phase: 'failed';
  stepId: string;
  error: string;
  kind: FailureKind;
  guidance?: ErrorGuidance;
}

export type SequenceState =
  | { phase: 'not-started' }
  | { phase: 'running'; stepIndex: number; stepId: string }
  | FailedState
  | { phase: 'completed' };

export type TerminalState = Extract<SequenceState, { phase: 'failed' | 'completed' }>;

export interface StepRecord {
  id: string;
  title: string;
  status: StepStatus | 'failed';
  message: string;
  warnings: string[];
  /** Readiness attempts, when the step polled */
  attempts?: number;
  durationMs: number;
}

export interface RunReport {
  plan: Plan['name'];
  state: TerminalState;
  steps: StepRecord[];
  snapshot: EnvironmentSnapshot;
  warnings: string[];
  durationMs: number;
}

export const done = (message: string, warnings: string[] = []): StepReport => ({
  status: 'done',
  message,
  warnings,
});

export const noop = (message: string): StepReport => ({ status: 'noop', message });

export const skipped = (message: string, warnings: string[] = []): StepReport => ({
  status: 'skipped',
  message,
  warnings,
});
