/**
 * Bootstrap Context
 *
 * Everything a step receives: configuration, the clients for the three
 * external systems, the reporter, and the snapshot of values discovered so
 * far. Steps talk to the outside world only through these clients, so tests
 * can substitute in-memory implementations.
 */

import type { Logger } from 'pino';
import type { BootstrapConfig } from '@/config';
import type { SequenceReporter } from '@/bootstrap/reporter';
import { createSnapshot, type EnvironmentSnapshot } from '@/bootstrap/types';
import { createContainerRuntime, type ContainerRuntime } from '@/infra/docker/client';
import { createClusterManager, type ClusterManager } from '@/infra/kind/client';
import { createKubernetesClient, type KubernetesClient } from '@/infra/kubernetes/client';
import { probeEndpoint, type EndpointProbe } from '@/infra/http/probe';
import { createCommandRunner, type CommandRunner } from '@/infra/process/runner';
import { sleep, type Sleep } from '@/lib/polling';

// ===== TYPES =====

export interface BootstrapContext {
  config: BootstrapConfig;
  /** Structured logging; status lines for the operator go to `reporter` */
  logger: Logger;
  reporter: SequenceReporter;
  docker: ContainerRuntime;
  cluster: ClusterManager;
  kube: KubernetesClient;
  probe: EndpointProbe;
  /** Mutable: steps record discovered values here for later steps */
  snapshot: EnvironmentSnapshot;
  /** Used by readiness polling */
  sleep: Sleep;
  /** Aborts the run before the next step */
  signal?: AbortSignal;
}

// ===== CONTEXT OPTIONS =====

export interface ContextOptions {
  runner?: CommandRunner;
  docker?: ContainerRuntime;
  cluster?: ClusterManager;
  kube?: KubernetesClient;
  probe?: EndpointProbe;
  sleep?: Sleep;
  signal?: AbortSignal;
}

// ===== CONTEXT FACTORY =====

/**
 * Create a BootstrapContext wired to the real tools.
 *
 * Any client passed in `options` replaces the default one.
 *
 * @example
 * ```typescript
 * const ctx = createBootstrapContext(config, logger, createConsoleReporter(), {
 *   signal: abortController.signal,
 * });
 * const report = await runSequence(startPlan(), ctx);
 * ```
 */
export function createBootstrapContext(
  config: BootstrapConfig,
  logger: Logger,
  reporter: SequenceReporter,
  options: ContextOptions = {},
): BootstrapContext {
  // docker compose and kind must reach the same engine as dockerode
  const runner =
    options.runner ??
    createCommandRunner(
      logger.child({ component: 'process' }),
      config.dockerSocket ? { ...process.env, DOCKER_HOST: `unix://${config.dockerSocket}` } : process.env,
    );

  const ctx: BootstrapContext = {
    config,
    logger,
    reporter,
    docker:
      options.docker ??
      createContainerRuntime(logger.child({ component: 'docker' }), runner, {
        ...(config.dockerSocket && { socketPath: config.dockerSocket }),
      }),
    cluster: options.cluster ?? createClusterManager(logger.child({ component: 'kind' }), runner),
    kube: options.kube ?? createKubernetesClient(logger.child({ component: 'kubectl' }), runner),
    probe: options.probe ?? probeEndpoint,
    snapshot: createSnapshot(),
    sleep: options.sleep ?? sleep,
  };

  if (options.signal !== undefined) ctx.signal = options.signal;

  return ctx;
}
