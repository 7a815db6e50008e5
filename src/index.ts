/**
 * Programmatic API of the Cube Studio bootstrap
 */

/**
 * Creates the bootstrap application.
 *
 * @example
 * ```typescript
 * import { createApp, exitCodeOf, loadConfig } from 'cube-studio-bootstrap';
 *
 * const config = loadConfig();
 * if (config.ok) {
 *   const report = await createApp(config.value).start();
 *   process.exitCode = exitCodeOf(report);
 * }
 * ```
 *
 * @public
 */
export { createApp, exitCodeOf } from './app';
export type { AppOptions, BootstrapApp } from './app';

export { loadConfig, projectPath } from './config';
export type { BootstrapConfig } from './config';

export { runSequence } from './bootstrap/sequencer';
export { startPlan, repairPlan } from './bootstrap/plans';
export { createConsoleReporter, createSilentReporter } from './bootstrap/reporter';
export type { SequenceReporter } from './bootstrap/reporter';
export type {
  Plan,
  Step,
  StepReport,
  StepRecord,
  RunReport,
  SequenceState,
  EnvironmentSnapshot,
} from './bootstrap/types';

export { createBootstrapContext } from './core';
export type { BootstrapContext, ContextOptions } from './core';

export type { ContainerRuntime } from './infra/docker/client';
export type { ClusterManager } from './infra/kind/client';
export type { KubernetesClient } from './infra/kubernetes/client';
export type { CommandRunner } from './infra/process/runner';

export { pollUntil } from './lib/polling';
export type { PollOptions, PollOutcome } from './lib/polling';

export type { Result, ErrorGuidance } from './types';
export { Success, Failure, isSuccess } from './types';
