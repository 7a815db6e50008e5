/**
 * Bootstrap configuration
 *
 * The whole run is driven by an explicit `BootstrapConfig`. It is read from
 * the environment once, validated with zod, and passed into the sequencer.
 */

import { isAbsolute, resolve } from 'node:path';
import { z } from 'zod';
import { Failure, Success, type Result } from '@/types';

export * from './constants';

const AFFIRMATIVE = ['true', '1', 'yes'];

const flagSchema = z
  .string()
  .optional()
  .transform((value) => (value ? AFFIRMATIVE.includes(value.trim().toLowerCase()) : false));

const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

/**
 * Environment variables read by the bootstrap.
 */
export const environmentSchema = z.object({
  FORCE_REBUILD_CLUSTER: flagSchema,
  CUBE_STUDIO_ROOT: z.string().trim().min(1).optional(),
  LOG_LEVEL: logLevelSchema.optional(),
  LOG_FILE: z.string().trim().min(1).optional(),
  NO_COLOR: z.string().optional(),
  DOCKER_SOCKET: z.string().trim().min(1).optional(),
});

export interface BootstrapConfig {
  /** Absolute path of the Cube Studio checkout */
  projectRoot: string;
  /**
   * Delete and recreate the kind cluster instead of reusing it.
   * Set through FORCE_REBUILD_CLUSTER=true.
   */
  forceRebuildCluster: boolean;
  logLevel: z.infer<typeof logLevelSchema>;
  logFile?: string;
  /** Colour status lines */
  color: boolean;
  /**
   * Docker engine socket. When unset, dockerode follows DOCKER_HOST and
   * falls back to /var/run/docker.sock.
   */
  dockerSocket?: string;
}

/**
 * Build the configuration from an environment map.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): Result<BootstrapConfig> {
  const parsed = environmentSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join('.') || 'environment'}: ${issue.message}`,
    );
    return Failure(`Invalid configuration: ${issues.join('; ')}`, {
      message: 'Environment variables failed validation',
      hint: issues.join('\n'),
      resolution: 'Fix or unset the listed environment variables and re-run',
      details: { kind: 'invalid-config', issues },
    });
  }

  const values = parsed.data;
  const root = values.CUBE_STUDIO_ROOT ?? cwd;

  return Success({
    projectRoot: isAbsolute(root) ? root : resolve(cwd, root),
    forceRebuildCluster: values.FORCE_REBUILD_CLUSTER,
    logLevel: values.LOG_LEVEL ?? 'warn',
    ...(values.LOG_FILE && { logFile: resolve(cwd, values.LOG_FILE) }),
    color: !values.NO_COLOR,
    ...(values.DOCKER_SOCKET && { dockerSocket: values.DOCKER_SOCKET }),
  });
}

/**
 * Resolve a project-relative path.
 */
export function projectPath(config: Pick<BootstrapConfig, 'projectRoot'>, relative: string): string {
  return resolve(config.projectRoot, relative);
}
