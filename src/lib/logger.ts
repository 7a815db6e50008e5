/**
 * Structured logging built on pino.
 *
 * Status lines for the operator are printed by the sequence reporter; this
 * logger carries the machine-readable trail (step ids, commands, durations).
 */

import pino, { type Logger, type LevelWithSilent } from 'pino';

export type { Logger } from 'pino';

export interface LoggerOptions {
  /** Logger name, shown as `name` in every record */
  name: string;
  /** Minimum level (default: `warn`) */
  level?: LevelWithSilent;
  /** Write records to this file instead of stderr */
  file?: string;
}

export function createLogger(options: LoggerOptions): Logger {
  const level = options.level ?? 'warn';

  const destination = options.file
    ? pino.destination({ dest: options.file, mkdir: true, sync: true })
    : pino.destination({ fd: 2, sync: true });

  return pino(
    {
      name: options.name,
      level,
      base: { pid: process.pid },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    destination,
  );
}

export interface Timer {
  /** Log completion with the elapsed time and return it in milliseconds */
  end(fields?: Record<string, unknown>): number;
  /** Log failure with the elapsed time and return it in milliseconds */
  error(error: unknown, fields?: Record<string, unknown>): number;
}

/**
 * Time an operation and log its duration on completion.
 */
export function createTimer(logger: Logger, operation: string): Timer {
  const startTime = Date.now();

  return {
    end(fields = {}) {
      const durationMs = Date.now() - startTime;
      logger.debug({ ...fields, operation, durationMs }, `${operation} completed`);
      return durationMs;
    },
    error(error, fields = {}) {
      const durationMs = Date.now() - startTime;
      logger.error({ ...fields, operation, durationMs, error }, `${operation} failed`);
      return durationMs;
    },
  };
}
