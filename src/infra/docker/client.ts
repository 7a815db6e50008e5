/**
 * Container runtime client
 *
 * Engine operations (networks, inspection, exec) go through dockerode; Compose
 * has no engine API, so stack operations shell out to `docker compose`.
 */

import Docker from 'dockerode';
import type { Logger } from 'pino';
import { Success, Failure, type Result } from '@/types';
import { DEFAULT_TIMEOUTS } from '@/config/constants';
import {
  extractContainerNetworkAddress,
  extractNetworkMemberAddress,
  listContainerNetworks,
} from '@/lib/address-discovery';
import { commandOutput, formatCommand, type CommandRunner } from '@/infra/process/runner';
import { extractDockerErrorGuidance, isAlreadyConnectedError, isNotFoundError } from './errors';

/**
 * Docker client configuration options.
 */
export interface DockerClientConfig {
  /** Docker socket path; when unset dockerode resolves DOCKER_HOST */
  socketPath?: string;
}

/**
 * Observed state of a container.
 */
export interface ContainerState {
  /** Engine status string (running, exited, restarting, ...) */
  status: string;
  running: boolean;
  /** Health check status, when the container defines one */
  health?: string;
}

export type NetworkAttachment = 'connected' | 'already-connected';

/**
 * Container runtime operations used by the bootstrap.
 */
export interface ContainerRuntime {
  /**
   * Checks that the engine answers.
   * @returns Result containing the engine version
   */
  ping(): Promise<Result<string>>;

  /** Whether the `docker compose` plugin is usable */
  composeAvailable(): Promise<boolean>;

  composeUp(projectDir: string): Promise<Result<void>>;

  composeDown(projectDir: string): Promise<Result<void>>;

  composeRestart(projectDir: string, services: readonly string[]): Promise<Result<void>>;

  /** `docker compose ps` table */
  composeStatus(projectDir: string): Promise<Result<string>>;

  /**
   * State of a container, or null when it does not exist.
   */
  containerState(container: string): Promise<ContainerState | null>;

  /**
   * Attaches a container to a network. An existing attachment is a success.
   */
  connectToNetwork(network: string, container: string): Promise<Result<NetworkAttachment>>;

  isConnectedToNetwork(container: string, network: string): Promise<boolean>;

  /**
   * Address of a container on a network, or null when it cannot be found.
   */
  getContainerAddress(container: string, network: string): Promise<string | null>;

  /**
   * Address of a named member of a network, or null when it cannot be found.
   */
  getNetworkMemberAddress(network: string, member: string): Promise<string | null>;

  /**
   * Runs a command inside a container and waits for it to exit.
   */
  exec(container: string, command: readonly string[]): Promise<Result<void>>;
}

function createBaseContainerRuntime(
  docker: Docker,
  runner: CommandRunner,
  logger: Logger,
): ContainerRuntime {
  const compose = async (
    projectDir: string,
    args: string[],
    operation: string,
  ): Promise<Result<void>> => {
    const fullArgs = ['compose', ...args];
    const result = await runner.run('docker', fullArgs, {
      cwd: projectDir,
      timeoutMs: DEFAULT_TIMEOUTS.compose,
    });
    if (result.exitCode === 0) {
      logger.debug({ projectDir, args }, `Docker compose ${operation} completed`);
      return Success(undefined);
    }

    const output = commandOutput(result);
    logger.error(
      { projectDir, args, exitCode: result.exitCode, output },
      `Docker compose ${operation} failed`,
    );
    return Failure(`docker compose ${operation} failed: ${output || `exit code ${result.exitCode}`}`, {
      message: `docker compose ${operation} failed`,
      hint: 'Compose could not reach the desired state for the stack',
      resolution: `Run \`${formatCommand('docker', fullArgs)}\` in ${projectDir} to see the full output`,
      details: { exitCode: result.exitCode, output },
    });
  };

  const inspectContainer = async (container: string) => {
    try {
      return await docker.getContainer(container).inspect();
    } catch (error) {
      if (!isNotFoundError(error)) {
        logger.debug(
          { container, error: extractDockerErrorGuidance(error).message },
          'Container inspection failed',
        );
      }
      return null;
    }
  };

  return {
    async ping() {
      try {
        const version = await docker.version();
        logger.debug({ version: version.Version }, 'Docker engine reachable');
        return Success(version.Version);
      } catch (error) {
        const guidance = extractDockerErrorGuidance(error);
        logger.error(
          { error: guidance.message, hint: guidance.hint, errorDetails: guidance.details },
          'Docker ping failed',
        );
        return Failure(guidance.message ?? 'Docker engine is not reachable', guidance);
      }
    },

    async composeAvailable() {
      const result = await runner.run('docker', ['compose', 'version'], {
        timeoutMs: DEFAULT_TIMEOUTS.query,
      });
      return result.exitCode === 0;
    },

    composeUp(projectDir) {
      return compose(projectDir, ['up', '-d'], 'up');
    },

    composeDown(projectDir) {
      return compose(projectDir, ['down'], 'down');
    },

    composeRestart(projectDir, services) {
      return compose(projectDir, ['restart', ...services], 'restart');
    },

    async composeStatus(projectDir) {
      const result = await runner.run('docker', ['compose', 'ps'], {
        cwd: projectDir,
        timeoutMs: DEFAULT_TIMEOUTS.query,
      });
      if (result.exitCode !== 0) {
        return Failure(`docker compose ps failed: ${commandOutput(result) || `exit code ${result.exitCode}`}`);
      }
      return Success(result.stdout.trimEnd());
    },

    async containerState(container) {
      const info = await inspectContainer(container);
      if (!info) {
        return null;
      }
      const health = info.State.Health?.Status;
      return {
        status: info.State.Status,
        running: info.State.Running,
        ...(health && { health }),
      };
    },

    async connectToNetwork(network, container) {
      try {
        logger.debug({ network, container }, 'Connecting container to network');
        await docker.getNetwork(network).connect({ Container: container });
        logger.info({ network, container }, 'Container connected to network');
        return Success<NetworkAttachment>('connected');
      } catch (error) {
        const guidance = extractDockerErrorGuidance(error);
        const message = guidance.message ?? 'unknown error';
        if (isAlreadyConnectedError(message)) {
          logger.debug({ network, container }, 'Container already connected to network');
          return Success<NetworkAttachment>('already-connected');
        }

        logger.warn(
          { network, container, error: message, hint: guidance.hint },
          'Docker network connect failed',
        );
        return Failure(`Failed to connect ${container} to ${network}: ${message}`, guidance);
      }
    },

    async isConnectedToNetwork(container, network) {
      const info = await inspectContainer(container);
      const connected = info !== null && listContainerNetworks(info).includes(network);
      logger.debug({ container, network, connected }, 'Checking container network connection');
      return connected;
    },

    async getContainerAddress(container, network) {
      const info = await inspectContainer(container);
      const address = info ? extractContainerNetworkAddress(info, network) : null;
      logger.debug({ container, network, address }, 'Container address lookup');
      return address;
    },

    async getNetworkMemberAddress(network, member) {
      try {
        const info = await docker.getNetwork(network).inspect();
        const address = extractNetworkMemberAddress(info, member);
        logger.debug({ network, member, address }, 'Network member address lookup');
        return address;
      } catch (error) {
        logger.debug(
          { network, member, error: extractDockerErrorGuidance(error).message },
          'Network inspection failed',
        );
        return null;
      }
    },

    async exec(container, command) {
      try {
        const exec = await docker.getContainer(container).exec({
          Cmd: [...command],
          AttachStdout: true,
          AttachStderr: true,
        });
        const stream = await exec.start({ hijack: true, stdin: false });
        await new Promise<void>((resolve, reject) => {
          stream.on('end', resolve);
          stream.on('close', resolve);
          stream.on('error', reject);
          stream.resume();
        });

        const { ExitCode: exitCode } = await exec.inspect();
        if (exitCode !== 0 && exitCode !== null) {
          return Failure(`Command exited with code ${exitCode} in ${container}: ${command.join(' ')}`, {
            message: 'Command inside container failed',
            details: { container, command, exitCode },
          });
        }
        return Success(undefined);
      } catch (error) {
        const guidance = extractDockerErrorGuidance(error);
        logger.warn({ container, command, error: guidance.message }, 'Docker exec failed');
        return Failure(`Failed to run ${command.join(' ')} in ${container}: ${guidance.message}`, guidance);
      }
    },
  };
}

/**
 * Create a container runtime client
 * @param logger - Logger instance for debug output
 * @param runner - Runs `docker compose`
 * @param config - Optional Docker client configuration
 */
export const createContainerRuntime = (
  logger: Logger,
  runner: CommandRunner,
  config: DockerClientConfig = {},
): ContainerRuntime => {
  // Without a socket, dockerode reads DOCKER_HOST like the docker CLI does
  const docker = config.socketPath ? new Docker({ socketPath: config.socketPath }) : new Docker();
  logger.debug({ socketPath: config.socketPath ?? 'from DOCKER_HOST' }, 'Created Docker client');

  return createBaseContainerRuntime(docker, runner, logger);
};
