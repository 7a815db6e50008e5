/**
 * Application Entry Point
 *
 * Wires configuration, logging, reporting and the external clients together
 * and exposes the two plans as `start()` and `repair()`.
 */

import type { Logger } from 'pino';
import type { BootstrapConfig } from '@/config';
import { createLogger } from '@/lib/logger';
import { createBootstrapContext, type ContextOptions } from '@/core/context';
import { createConsoleReporter, type SequenceReporter } from '@/bootstrap/reporter';
import { runSequence } from '@/bootstrap/sequencer';
import { repairPlan, startPlan } from '@/bootstrap/plans';
import { printFailureSummary, printRepairSummary, printStartSummary } from '@/bootstrap/summary';
import type { Plan, RunReport } from '@/bootstrap/types';

export interface AppOptions extends ContextOptions {
  logger?: Logger;
  reporter?: SequenceReporter;
}

export interface BootstrapApp {
  /** Full cold start of the environment */
  start(): Promise<RunReport>;
  /** Post-restart network and configuration repair */
  repair(): Promise<RunReport>;
}

export function exitCodeOf(report: RunReport): number {
  return report.state.phase === 'completed' ? 0 : 1;
}

/**
 * Create the bootstrap application.
 *
 * Each call to `start()` or `repair()` gets a fresh context, so discovered
 * values never leak from one run into the next.
 */
export function createApp(config: BootstrapConfig, options: AppOptions = {}): BootstrapApp {
  const logger =
    options.logger ??
    createLogger({
      name: 'cube-bootstrap',
      level: config.logLevel,
      ...(config.logFile && { file: config.logFile }),
    });
  const reporter = options.reporter ?? createConsoleReporter({ color: config.color });

  const run = async (plan: Plan): Promise<RunReport> => {
    const ctx = createBootstrapContext(config, logger, reporter, options);
    const report = await runSequence(plan, ctx);

    if (report.state.phase === 'failed') {
      printFailureSummary(ctx, report);
    } else if (plan.name === 'start') {
      await printStartSummary(ctx, report);
    } else {
      await printRepairSummary(ctx, report);
    }
    return report;
  };

  return {
    start: () => run(startPlan()),
    repair: () => run(repairPlan()),
  };
}
