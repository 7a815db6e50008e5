/**
 * Bootstrap Sequencer
 *
 * Runs the steps of a plan in order. Each step is guarded, acted on, and then
 * polled for readiness. The first failure ends the run in the `failed` state;
 * nothing is rolled back, so the operator can inspect what was left behind
 * and simply re-run.
 */

import { Failure, type Result } from '@/types';
import { createTimer } from '@/lib/logger';
import { extractErrorMessage, failWith, failureKindOf } from '@/lib/errors';
import { pollUntil } from '@/lib/polling';
import type { BootstrapContext } from '@/core/context';
import type {
  FailedState,
  Plan,
  RunReport,
  SequenceState,
  Step,
  StepRecord,
  StepReport,
  TerminalState,
} from './types';

type StepExecution =
  | { ok: true; record: StepRecord }
  | { ok: false; record: StepRecord; failure: FailedState };

function toFailedState(step: Step, result: Extract<Result<unknown>, { ok: false }>): FailedState {
  return {
    phase: 'failed',
    stepId: step.id,
    error: result.error,
    kind: failureKindOf(result.guidance),
    ...(result.guidance && { guidance: result.guidance }),
  };
}

async function performAction(step: Step, ctx: BootstrapContext): Promise<Result<StepReport>> {
  if (step.guard && (await step.guard.check(ctx))) {
    return { ok: true, value: { status: 'noop', message: step.guard.description } };
  }
  return step.run(ctx);
}

async function awaitReadiness(
  step: Step,
  ctx: BootstrapContext,
  warnings: string[],
): Promise<{ result: Result<void>; attempts?: number }> {
  const readiness = step.readiness;
  if (!readiness || (readiness.when && !readiness.when(ctx))) {
    return { result: { ok: true, value: undefined } };
  }

  ctx.reporter.info(`Waiting for ${readiness.description}...`);
  const outcome = await pollUntil(() => readiness.check(ctx), {
    ...readiness.budget,
    sleep: ctx.sleep,
    ...(ctx.signal && { signal: ctx.signal }),
  });

  if (outcome.ready) {
    ctx.logger.debug(
      { step: step.id, attempts: outcome.attempts, elapsedMs: outcome.elapsedMs },
      'Readiness condition met',
    );
    return { result: { ok: true, value: undefined }, attempts: outcome.attempts };
  }

  if (outcome.reason === 'aborted') {
    return {
      result: failWith('aborted', `Interrupted while waiting for ${readiness.description}`),
      attempts: outcome.attempts,
    };
  }

  const message = `Timed out waiting for ${readiness.description} after ${outcome.attempts} attempts`;
  if (readiness.onTimeout === 'fail') {
    return {
      result: failWith('convergence-timeout', message, {
        hint: outcome.lastError ?? 'The condition never became true within the polling window',
        resolution: readiness.resolution ?? 'Inspect the environment and re-run once it has settled',
        details: { attempts: outcome.attempts, elapsedMs: outcome.elapsedMs },
      }),
      attempts: outcome.attempts,
    };
  }

  warnings.push(message);
  ctx.reporter.warning(message);
  return { result: { ok: true, value: undefined }, attempts: outcome.attempts };
}

async function executeStep(
  step: Step,
  index: number,
  total: number,
  ctx: BootstrapContext,
): Promise<StepExecution> {
  const log = ctx.logger.child({ step: step.id });
  const timer = createTimer(log, step.id);
  const warnings: string[] = [];

  ctx.reporter.stepStarted(index + 1, total, step.title);
  log.info({ index: index + 1, total }, 'Step started');

  const record = (
    status: StepRecord['status'],
    message: string,
    durationMs: number,
    attempts?: number,
  ): StepRecord => ({
    id: step.id,
    title: step.title,
    status,
    message,
    warnings,
    durationMs,
    ...(attempts !== undefined && { attempts }),
  });

  const failed = (result: Extract<Result<unknown>, { ok: false }>, attempts?: number) => {
    const durationMs = timer.error(result.error, { guidance: result.guidance });
    ctx.reporter.error(result.error);
    return {
      ok: false as const,
      record: record('failed', result.error, durationMs, attempts),
      failure: toFailedState(step, result),
    };
  };

  let action: Result<StepReport>;
  try {
    action = await performAction(step, ctx);
  } catch (error) {
    action = failWith('command-failed', `${step.title} failed: ${extractErrorMessage(error)}`);
  }
  if (!action.ok) {
    return failed(action);
  }

  const report = action.value;
  warnings.push(...(report.warnings ?? []));
  for (const warning of report.warnings ?? []) {
    ctx.reporter.warning(warning);
  }

  let attempts: number | undefined;
  if (report.status !== 'skipped') {
    let readiness: { result: Result<void>; attempts?: number };
    try {
      readiness = await awaitReadiness(step, ctx, warnings);
    } catch (error) {
      readiness = {
        result: Failure(`Readiness check of ${step.title} failed: ${extractErrorMessage(error)}`),
      };
    }
    if (!readiness.result.ok) {
      return failed(readiness.result, readiness.attempts);
    }
    attempts = readiness.attempts;
  }

  switch (report.status) {
    case 'done':
      ctx.reporter.success(report.message);
      break;
    case 'noop':
      ctx.reporter.info(report.message);
      break;
    case 'skipped':
      warnings.push(report.message);
      ctx.reporter.warning(report.message);
      break;
  }

  const durationMs = timer.end({ status: report.status, warnings: warnings.length });
  return { ok: true, record: record(report.status, report.message, durationMs, attempts) };
}

/**
 * Execute a plan and return its report.
 *
 * The state machine is `not-started -> running(i) -> running(i+1) | failed |
 * completed`. There is no retry across steps, only within a step's readiness
 * polling.
 */
export async function runSequence(plan: Plan, ctx: BootstrapContext): Promise<RunReport> {
  const startedAt = Date.now();
  const log = ctx.logger.child({ plan: plan.name });
  const steps: StepRecord[] = [];
  const warnings: string[] = [];

  let state: SequenceState = { phase: 'not-started' };
  const transition = (next: SequenceState): void => {
    log.debug({ from: state.phase, to: next.phase }, 'Sequence transition');
    state = next;
  };

  ctx.reporter.header(plan.title);
  log.info({ steps: plan.steps.length }, 'Sequence started');

  let failure: FailedState | undefined;
  for (const [index, step] of plan.steps.entries()) {
    if (ctx.signal?.aborted) {
      failure = { phase: 'failed', stepId: step.id, error: 'Run interrupted', kind: 'aborted' };
      ctx.reporter.error(`Run interrupted before ${step.title}`);
      break;
    }

    transition({ phase: 'running', stepIndex: index, stepId: step.id });
    const execution = await executeStep(step, index, plan.steps.length, ctx);
    steps.push(execution.record);
    warnings.push(...execution.record.warnings);

    if (!execution.ok) {
      failure = execution.failure;
      break;
    }
  }

  const final: TerminalState = failure ?? { phase: 'completed' };
  transition(final);

  const durationMs = Date.now() - startedAt;
  if (final.phase === 'failed') {
    log.error(
      { stepId: final.stepId, kind: final.kind, error: final.error, durationMs },
      'Sequence failed',
    );
  } else {
    log.info({ durationMs, warnings: warnings.length }, 'Sequence completed');
  }

  return {
    plan: plan.name,
    state: final,
    steps,
    snapshot: ctx.snapshot,
    warnings,
    durationMs,
  };
}
