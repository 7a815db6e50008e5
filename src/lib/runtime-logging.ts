/**
 * Shared Runtime Logging - Startup/Interrupt/Completion Logging
 *
 * Consistent lifecycle messages for the CLI: a structured record for the log
 * and an emoji-prefixed line on stderr for the operator.
 */

import type { Logger } from 'pino';

/**
 * Runtime startup information
 */
export interface StartupInfo {
  /** Application name */
  appName: string;
  /** Application version */
  version: string;
  /** Plan being run */
  command: string;
  /** Project root */
  projectRoot: string;
  /** Log level */
  logLevel: string;
  /** Recreate the cluster instead of reusing it */
  forceRebuildCluster: boolean;
}

/**
 * Run completion information
 */
export interface CompletionInfo {
  command: string;
  /** Duration of the run in milliseconds */
  duration: number;
  exitCode: number;
  warnings: number;
}

/**
 * Log startup messages in a consistent format
 */
export function logStartup(info: StartupInfo, logger: Logger, quiet = false): void {
  logger.info(
    {
      version: info.version,
      command: info.command,
      config: {
        logLevel: info.logLevel,
        projectRoot: info.projectRoot,
        forceRebuildCluster: info.forceRebuildCluster,
      },
    },
    `Starting ${info.appName}`,
  );

  if (!quiet) {
    console.error(`🚀 ${info.appName} ${info.version}: ${info.command}`);
    console.error(`🏠 Project root: ${info.projectRoot}`);
    if (info.forceRebuildCluster) {
      console.error('🔧 FORCE_REBUILD_CLUSTER is set: the kind cluster will be recreated');
    }
  }
}

/**
 * Log startup failure
 */
export function logStartupFailure(error: Error, logger: Logger, quiet = false): void {
  logger.error({ error }, 'Startup failed');

  if (!quiet) {
    console.error('❌ Startup failed');
    console.error(`🔍 Error: ${error.message}`);
  }
}

/**
 * Log the end of a run
 */
export function logCompletion(info: CompletionInfo, logger: Logger, quiet = false): void {
  logger.info(info, 'Run finished');

  if (!quiet) {
    const seconds = (info.duration / 1000).toFixed(1);
    console.error(
      info.exitCode === 0
        ? `✅ ${info.command} finished in ${seconds}s`
        : `❌ ${info.command} failed after ${seconds}s`,
    );
  }
}

/**
 * Install signal handlers that abort the run between steps.
 *
 * The first SIGINT/SIGTERM aborts `controller`; the running step finishes and
 * the sequence stops. A second signal exits immediately.
 *
 * @returns a function that removes the handlers
 */
export function installShutdownHandlers(
  controller: AbortController,
  logger: Logger,
  quiet = false,
): () => void {
  const handler = (signal: NodeJS.Signals): void => {
    if (controller.signal.aborted) {
      logger.error({ signal }, 'Forced exit');
      if (!quiet) {
        console.error('⚠️ Forced exit - the current step was interrupted');
      }
      process.exit(1);
    }

    logger.info({ signal }, 'Interrupt received');
    if (!quiet) {
      console.error(`\n🛑 Received ${signal}, stopping after the current step...`);
    }
    controller.abort();
  };

  process.on('SIGINT', handler);
  process.on('SIGTERM', handler);

  return () => {
    process.off('SIGINT', handler);
    process.off('SIGTERM', handler);
  };
}
