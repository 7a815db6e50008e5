/**
 * kind cluster manager client
 *
 * Wraps the `kind` CLI. Cluster configuration is rendered with js-yaml and
 * handed to `kind create cluster --config -` on standard input.
 */

import yaml from 'js-yaml';
import type { Logger } from 'pino';
import { Success, Failure, type Result } from '@/types';
import { CLUSTER, DEFAULT_TIMEOUTS } from '@/config/constants';
import { commandOutput, formatCommand, type CommandRunner } from '@/infra/process/runner';

export interface KindPortMapping {
  containerPort: number;
  hostPort: number;
  protocol?: 'TCP' | 'UDP';
}

export interface KindNode {
  role: 'control-plane' | 'worker';
  image?: string;
  extraPortMappings?: KindPortMapping[];
}

export interface KindClusterConfig {
  kind: 'Cluster';
  apiVersion: 'kind.x-k8s.io/v1alpha4';
  nodes: KindNode[];
}

export interface ClusterManager {
  /** Whether the `kind` binary is on PATH */
  isInstalled(): Promise<boolean>;
  listClusters(): Promise<Result<string[]>>;
  clusterExists(name: string): Promise<Result<boolean>>;
  createCluster(name: string, config: KindClusterConfig): Promise<Result<void>>;
  deleteCluster(name: string): Promise<Result<void>>;
  /**
   * Kubeconfig of a cluster. With `internal`, the API server address is the
   * one reachable from containers on the kind network.
   */
  getKubeconfig(name: string, options?: { internal?: boolean }): Promise<Result<string>>;
}

const CLUSTER_NAME = /^[a-z0-9]([-a-z0-9]*[a-z0-9])?$/;

/**
 * Cluster names must follow Kubernetes naming conventions.
 */
export function validateClusterName(name: string): Result<string> {
  if (!CLUSTER_NAME.test(name)) {
    return Failure(
      `Invalid cluster name: "${name}". Must contain only lowercase letters, numbers, and hyphens.`,
      {
        hint: 'Cluster names must follow Kubernetes naming conventions',
        resolution:
          'Use only lowercase letters (a-z), numbers (0-9), and hyphens (-). Start and end with alphanumeric characters',
        details: { kind: 'invalid-config' },
      },
    );
  }
  if (name.length > 63) {
    return Failure(`Cluster name too long: "${name}". Must be 63 characters or less.`, {
      hint: 'Kubernetes resource names have a maximum length of 63 characters',
      resolution: 'Shorten the cluster name to 63 characters or fewer',
      details: { kind: 'invalid-config' },
    });
  }
  return Success(name);
}

/**
 * Single control-plane node with the dashboard NodePort mapped to the host.
 */
export function defaultClusterConfig(): KindClusterConfig {
  return {
    kind: 'Cluster',
    apiVersion: 'kind.x-k8s.io/v1alpha4',
    nodes: [
      {
        role: 'control-plane',
        extraPortMappings: [
          {
            containerPort: CLUSTER.dashboardHostPort,
            hostPort: CLUSTER.dashboardHostPort,
            protocol: 'TCP',
          },
        ],
      },
    ],
  };
}

export function renderClusterConfig(config: KindClusterConfig): string {
  return yaml.dump(config, { noRefs: true, lineWidth: -1 });
}

export function parseClusterList(stdout: string): string[] {
  return stdout
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line && !line.startsWith('No kind clusters found'));
}

export const createClusterManager = (logger: Logger, runner: CommandRunner): ClusterManager => {
  const kind = (args: string[], input?: string, timeoutMs: number = DEFAULT_TIMEOUTS.query) =>
    runner.run('kind', args, { timeoutMs, ...(input !== undefined && { input }) });

  const failure = <T>(
    operation: string,
    args: string[],
    result: { exitCode: number; stdout: string; stderr: string },
    resolution: string,
  ): Result<T> => {
    const output = commandOutput(result);
    logger.error({ args, exitCode: result.exitCode, output }, `kind ${operation} failed`);
    return Failure(`kind ${operation} failed: ${output || `exit code ${result.exitCode}`}`, {
      message: `kind ${operation} failed`,
      hint: `\`${formatCommand('kind', args)}\` exited with code ${result.exitCode}`,
      resolution,
      details: { exitCode: result.exitCode, output },
    });
  };

  const manager: ClusterManager = {
    isInstalled() {
      return runner.exists('kind');
    },

    async listClusters() {
      const args = ['get', 'clusters'];
      const result = await kind(args);
      if (result.exitCode !== 0) {
        return failure(
          'get clusters',
          args,
          result,
          'Make sure Docker is running; kind keeps its clusters as containers',
        );
      }
      // kind prints "No kind clusters found." on stderr with an empty stdout
      const clusters = parseClusterList(result.stdout);
      logger.debug({ clusters }, 'Listed kind clusters');
      return Success(clusters);
    },

    async clusterExists(name) {
      const clusters = await manager.listClusters();
      if (!clusters.ok) {
        return clusters;
      }
      return Success(clusters.value.includes(name));
    },

    async createCluster(name, config) {
      const valid = validateClusterName(name);
      if (!valid.ok) {
        return valid;
      }

      const args = ['create', 'cluster', '--name', name, '--config', '-'];
      logger.info({ cluster: name }, 'Creating kind cluster');
      const result = await kind(args, renderClusterConfig(config), DEFAULT_TIMEOUTS.clusterCreate);
      if (result.exitCode !== 0) {
        return failure(
          'create cluster',
          args,
          result,
          `Delete any half-created cluster with \`kind delete cluster --name ${name}\` and retry`,
        );
      }
      logger.info({ cluster: name }, 'Kind cluster created');
      return Success(undefined);
    },

    async deleteCluster(name) {
      const valid = validateClusterName(name);
      if (!valid.ok) {
        return valid;
      }

      const args = ['delete', 'cluster', '--name', name];
      const result = await kind(args, undefined, DEFAULT_TIMEOUTS.clusterCreate);
      if (result.exitCode !== 0) {
        return failure('delete cluster', args, result, 'Remove the node containers with `docker rm -f`');
      }
      logger.info({ cluster: name }, 'Kind cluster deleted');
      return Success(undefined);
    },

    async getKubeconfig(name, options = {}) {
      const valid = validateClusterName(name);
      if (!valid.ok) {
        return valid;
      }

      const args = ['get', 'kubeconfig', '--name', name, ...(options.internal ? ['--internal'] : [])];
      const result = await kind(args);
      if (result.exitCode !== 0 || !result.stdout.trim()) {
        return failure('get kubeconfig', args, result, `Check that cluster ${name} is running`);
      }
      return Success(result.stdout);
    },
  };

  return manager;
};
