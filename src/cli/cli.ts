#!/usr/bin/env node
/**
 * Cube Studio bootstrap CLI
 * Brings up and repairs the local development environment
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { argv, cwd, env, exit } from 'node:process';
import { z } from 'zod';
import { createApp, exitCodeOf } from '@/app';
import { loadConfig, type BootstrapConfig } from '@/config';
import { createLogger } from '@/lib/logger';
import { extractErrorMessage } from '@/lib/errors';
import {
  installShutdownHandlers,
  logCompletion,
  logStartup,
  logStartupFailure,
} from '@/lib/runtime-logging';

const packageJsonPath = __dirname.includes('dist')
  ? join(__dirname, '../../../package.json') // dist/src/cli/ -> root
  : join(__dirname, '../../package.json'); // src/cli/ -> root
const packageJson = z
  .object({ version: z.string() })
  .parse(JSON.parse(readFileSync(packageJsonPath, 'utf-8')));

type PlanName = 'start' | 'repair';

async function runPlan(name: PlanName, config: BootstrapConfig): Promise<number> {
  const logger = createLogger({
    name: 'cube-bootstrap',
    level: config.logLevel,
    ...(config.logFile && { file: config.logFile }),
  });

  logStartup(
    {
      appName: 'cube-bootstrap',
      version: packageJson.version,
      command: name,
      projectRoot: config.projectRoot,
      logLevel: config.logLevel,
      forceRebuildCluster: config.forceRebuildCluster,
    },
    logger,
  );

  const controller = new AbortController();
  const removeHandlers = installShutdownHandlers(controller, logger);

  try {
    const app = createApp(config, { logger, signal: controller.signal });
    const report = name === 'start' ? await app.start() : await app.repair();
    const exitCode = exitCodeOf(report);
    logCompletion(
      { command: name, duration: report.durationMs, exitCode, warnings: report.warnings.length },
      logger,
    );
    return exitCode;
  } finally {
    removeHandlers();
  }
}

function commandAction(name: PlanName) {
  return async (): Promise<void> => {
    const config = loadConfig(env, cwd());
    if (!config.ok) {
      console.error(`❌ ${config.error}`);
      if (config.guidance?.resolution) {
        console.error(`💡 ${config.guidance.resolution}`);
      }
      exit(1);
    }
    exit(await runPlan(name, config.value));
  };
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('cube-bootstrap')
    .description('Bring up and repair the Cube Studio local development environment')
    .version(packageJson.version)
    .addHelpText(
      'after',
      `

Environment:
  FORCE_REBUILD_CLUSTER=true   delete and recreate the kind cluster
  CUBE_STUDIO_ROOT=<path>      project root (default: current directory)
  LOG_LEVEL=<level>            structured log level (default: warn)
  LOG_FILE=<path>              write structured logs to a file instead of stderr
  NO_COLOR=1                   plain status lines
  DOCKER_SOCKET=<path>         Docker engine socket (default: DOCKER_HOST, then /var/run/docker.sock)

Examples:
  $ cube-bootstrap                                 Full cold start
  $ FORCE_REBUILD_CLUSTER=true cube-bootstrap      Cold start with a fresh cluster
  $ cube-bootstrap repair                          Repair networking after a Docker restart
`,
    );

  program
    .command('start', { isDefault: true })
    .description('start Compose services, the kind cluster and the platform')
    .action(commandAction('start'));

  program
    .command('repair')
    .description('re-attach networks, update the MinIO address and redeploy the platform')
    .action(commandAction('repair'));

  return program;
}

if (require.main === module) {
  createProgram()
    .parseAsync(argv)
    .catch((error: unknown) => {
      const err = error instanceof Error ? error : new Error(extractErrorMessage(error));
      logStartupFailure(err, createLogger({ name: 'cube-bootstrap' }));
      exit(1);
    });
}
