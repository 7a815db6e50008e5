/**
 * Kubernetes client backed by kubectl
 *
 * kubectl is already a hard dependency of the environment and honours the
 * operator's kubeconfig and context, so every call goes through it. "Already
 * exists" and "not found" answers are reported as outcomes, not failures.
 */

import yaml from 'js-yaml';
import { z } from 'zod';
import type { Logger } from 'pino';
import { Success, Failure, type Result } from '@/types';
import { DEFAULT_TIMEOUTS } from '@/config/constants';
import {
  commandOutput,
  formatCommand,
  type CommandResult,
  type CommandRunner,
} from '@/infra/process/runner';

export interface K8sManifest {
  apiVersion: string;
  kind: string;
  metadata: {
    name: string;
    namespace?: string;
    labels?: Record<string, string>;
  };
  [key: string]: unknown;
}

export type CreateOutcome = 'created' | 'unchanged';
export type DeleteOutcome = 'deleted' | 'absent';

export interface KubernetesClient {
  /** Whether `kubectl` is on PATH */
  isInstalled(): Promise<boolean>;
  /** Whether the API server answers for the current context */
  ping(): Promise<boolean>;
  isNodeReady(node: string): Promise<boolean>;
  ensureNamespace(namespace: string): Promise<Result<CreateOutcome>>;
  resourceExists(kind: string, name: string, namespace?: string): Promise<boolean>;
  applyFile(path: string): Promise<Result<void>>;
  applyManifest(manifest: K8sManifest): Promise<Result<void>>;
  /** `kubectl apply -k`; returns the output without deprecation warnings */
  applyKustomization(directory: string): Promise<Result<string>>;
  deleteResource(kind: string, name: string, namespace?: string): Promise<Result<DeleteOutcome>>;
  labelNode(node: string, labels: Readonly<Record<string, string>>): Promise<Result<void>>;
  createConfigMapFromFile(
    name: string,
    namespace: string,
    file: string,
  ): Promise<Result<CreateOutcome>>;
  deploymentAvailable(name: string, namespace: string): Promise<boolean>;
  createToken(namespace: string, serviceAccount: string, duration: string): Promise<Result<string>>;
  /** `kubectl get nodes` table */
  describeNodes(): Promise<Result<string>>;
  /** `kubectl get pods` table, all namespaces when none is given */
  describePods(namespace?: string): Promise<Result<string>>;
}

const nodeSchema = z.object({
  status: z
    .object({
      conditions: z.array(z.object({ type: z.string(), status: z.string() })).optional(),
    })
    .optional(),
});

const deploymentSchema = z.object({
  status: z
    .object({
      availableReplicas: z.number().optional(),
    })
    .optional(),
});

export function isAlreadyExists(output: string): boolean {
  return /AlreadyExists|already exists/i.test(output);
}

/**
 * Drop kustomize deprecation warnings from `kubectl apply -k` output.
 */
export function filterKustomizeWarnings(output: string): string {
  return output
    .split('\n')
    .filter((line) => !/^\s*Warning:/.test(line))
    .join('\n')
    .trim();
}

export function parseJson(stdout: string): unknown {
  try {
    return JSON.parse(stdout);
  } catch {
    return undefined;
  }
}

export function nodeIsReady(document: unknown): boolean {
  const parsed = nodeSchema.safeParse(document);
  if (!parsed.success) {
    return false;
  }
  return (parsed.data.status?.conditions ?? []).some(
    (condition) => condition.type === 'Ready' && condition.status === 'True',
  );
}

export function deploymentIsAvailable(document: unknown): boolean {
  const parsed = deploymentSchema.safeParse(document);
  return parsed.success && (parsed.data.status?.availableReplicas ?? 0) > 0;
}

const namespaceArgs = (namespace?: string): string[] => (namespace ? ['-n', namespace] : []);

export const createKubernetesClient = (logger: Logger, runner: CommandRunner): KubernetesClient => {
  const kubectl = (args: string[], options: { input?: string; timeoutMs?: number } = {}) =>
    runner.run('kubectl', args, {
      timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUTS.query,
      ...(options.input !== undefined && { input: options.input }),
    });

  const failure = <T>(args: string[], result: CommandResult, resolution?: string): Result<T> => {
    const output = commandOutput(result);
    const command = formatCommand('kubectl', args);
    logger.error({ command, exitCode: result.exitCode, output }, 'kubectl command failed');
    return Failure(`${command} failed: ${output || `exit code ${result.exitCode}`}`, {
      message: `${command} failed`,
      hint: output.split('\n')[0] || `kubectl exited with code ${result.exitCode}`,
      resolution: resolution ?? 'Check cluster access with `kubectl cluster-info`',
      details: { exitCode: result.exitCode, output },
    });
  };

  const createIdempotent = async (args: string[]): Promise<Result<CreateOutcome>> => {
    const result = await kubectl(args);
    if (result.exitCode === 0) {
      return Success<CreateOutcome>('created');
    }
    if (isAlreadyExists(result.stderr)) {
      logger.debug({ args }, 'Object already exists');
      return Success<CreateOutcome>('unchanged');
    }
    return failure(args, result);
  };

  const apply = async (args: string[], input?: string): Promise<Result<string>> => {
    const result = await kubectl(args, {
      timeoutMs: DEFAULT_TIMEOUTS.apply,
      ...(input !== undefined && { input }),
    });
    if (result.exitCode !== 0) {
      return failure(args, result, 'Validate the manifest with `kubectl apply --dry-run=client`');
    }
    logger.debug({ args, output: result.stdout.trim() }, 'kubectl apply completed');
    return Success(result.stdout);
  };

  const table = async (args: string[]): Promise<Result<string>> => {
    const result = await kubectl(args);
    return result.exitCode === 0 ? Success(result.stdout.trimEnd()) : failure(args, result);
  };

  return {
    isInstalled() {
      return runner.exists('kubectl');
    },

    async ping() {
      const result = await kubectl(['get', 'nodes']);
      logger.debug({ reachable: result.exitCode === 0 }, 'Cluster connectivity check');
      return result.exitCode === 0;
    },

    async isNodeReady(node) {
      const result = await kubectl(['get', 'node', node, '-o', 'json']);
      return result.exitCode === 0 && nodeIsReady(parseJson(result.stdout));
    },

    async ensureNamespace(namespace) {
      const outcome = await createIdempotent(['create', 'namespace', namespace]);
      if (outcome.ok) {
        logger.debug({ namespace, outcome: outcome.value }, 'Namespace ensured');
      }
      return outcome;
    },

    async resourceExists(kind, name, namespace) {
      const result = await kubectl(['get', kind, name, ...namespaceArgs(namespace)]);
      return result.exitCode === 0;
    },

    async applyFile(path) {
      const applied = await apply(['apply', '-f', path]);
      return applied.ok ? Success(undefined) : applied;
    },

    async applyManifest(manifest) {
      const applied = await apply(['apply', '-f', '-'], yaml.dump(manifest, { noRefs: true }));
      if (!applied.ok) {
        return applied;
      }
      logger.info(
        { kind: manifest.kind, name: manifest.metadata.name, namespace: manifest.metadata.namespace },
        'Manifest applied',
      );
      return Success(undefined);
    },

    async applyKustomization(directory) {
      const applied = await apply(['apply', '-k', directory]);
      return applied.ok ? Success(filterKustomizeWarnings(applied.value)) : applied;
    },

    async deleteResource(kind, name, namespace) {
      const args = ['delete', kind, name, ...namespaceArgs(namespace), '--ignore-not-found'];
      const result = await kubectl(args);
      if (result.exitCode !== 0) {
        return failure(args, result);
      }
      return Success<DeleteOutcome>(result.stdout.trim() ? 'deleted' : 'absent');
    },

    async labelNode(node, labels) {
      const pairs = Object.entries(labels).map(([key, value]) => `${key}=${value}`);
      const args = ['label', 'node', node, ...pairs, '--overwrite'];
      const result = await kubectl(args);
      return result.exitCode === 0 ? Success(undefined) : failure(args, result);
    },

    createConfigMapFromFile(name, namespace, file) {
      return createIdempotent(['create', 'configmap', name, '-n', namespace, `--from-file=${file}`]);
    },

    async deploymentAvailable(name, namespace) {
      const result = await kubectl(['get', 'deployment', name, '-n', namespace, '-o', 'json']);
      return result.exitCode === 0 && deploymentIsAvailable(parseJson(result.stdout));
    },

    async createToken(namespace, serviceAccount, duration) {
      const args = ['create', 'token', serviceAccount, '-n', namespace, `--duration=${duration}`];
      const result = await kubectl(args);
      if (result.exitCode !== 0 || !result.stdout.trim()) {
        return failure(args, result, 'The dashboard service account may not exist yet');
      }
      return Success(result.stdout.trim());
    },

    describeNodes() {
      return table(['get', 'nodes']);
    },

    describePods(namespace) {
      return table(['get', 'pods', ...(namespace ? ['-n', namespace] : ['-A'])]);
    },
  };
};
