/**
 * Deployment of the platform itself into the cluster through its kustomize
 * overlay.
 */

import { Success } from '@/types';
import {
  BACKING_SERVICES,
  CLUSTER,
  COMPOSE,
  KUBERNETES,
  PATHS,
  READINESS,
  mysqlServiceUrl,
  projectPath,
} from '@/config';
import {
  normalizeLineEndings,
  replaceEnvAssignment,
  rewriteFile,
} from '@/lib/config-rewrite';
import { done, skipped, type Step } from '../types';
import { fileExists } from './helpers';

export interface DeployPlatformOptions {
  /** Keep a `.bak` copy of the kustomization before rewriting it */
  backup: boolean;
}

export function deployPlatform(options: DeployPlatformOptions): Step {
  return {
    id: 'deploy-platform',
    title: 'Deploying Cube Studio to Kubernetes',

    async run(ctx) {
      const warnings: string[] = [];

      const entrypoint = projectPath(ctx.config, PATHS.overlayEntrypoint);
      if (await fileExists(entrypoint)) {
        await rewriteFile(entrypoint, [normalizeLineEndings]);
      }

      const mysql = await ctx.docker.getContainerAddress(COMPOSE.containers.mysql, CLUSTER.network);
      const redis = await ctx.docker.getContainerAddress(COMPOSE.containers.redis, CLUSTER.network);
      if (!mysql || !redis) {
        const missing = [!mysql && 'MySQL', !redis && 'Redis'].filter(Boolean).join(' and ');
        return Success(
          skipped(`Could not discover the ${missing} address, platform deployment skipped`),
        );
      }
      ctx.snapshot.mysqlAddress = mysql;
      ctx.snapshot.redisAddress = redis;
      ctx.reporter.info(`MySQL address: ${mysql}`);
      ctx.reporter.info(`Redis address: ${redis}`);

      const kustomization = projectPath(ctx.config, PATHS.overlayKustomization);
      if (!(await fileExists(kustomization))) {
        return Success(
          skipped(`${PATHS.overlayKustomization} not found, platform deployment skipped`),
        );
      }

      const rewritten = await rewriteFile(
        kustomization,
        [
          (content) => replaceEnvAssignment(content, BACKING_SERVICES.redisHostKey, redis),
          (content) =>
            replaceEnvAssignment(content, BACKING_SERVICES.mysqlServiceKey, mysqlServiceUrl(mysql)),
        ],
        { backup: options.backup },
      );
      if (!rewritten.matched) {
        warnings.push(
          `${BACKING_SERVICES.redisHostKey} or ${BACKING_SERVICES.mysqlServiceKey} not found in ${PATHS.overlayKustomization}`,
        );
      }

      const { namespace, kubeconfigConfigMap } = KUBERNETES.platform;
      const kubeconfig = projectPath(ctx.config, PATHS.kubeconfig);
      if (await fileExists(kubeconfig)) {
        const configMap = await ctx.kube.createConfigMapFromFile(
          kubeconfigConfigMap,
          namespace,
          kubeconfig,
        );
        if (!configMap.ok) {
          warnings.push(`ConfigMap ${kubeconfigConfigMap} not created: ${configMap.error}`);
        }
      } else {
        warnings.push(`${PATHS.kubeconfig} not found, ConfigMap ${kubeconfigConfigMap} not created`);
      }

      ctx.reporter.info('Applying the kustomize overlay...');
      const applied = await ctx.kube.applyKustomization(projectPath(ctx.config, PATHS.overlayDir));
      if (!applied.ok) {
        return applied;
      }
      ctx.logger.debug({ output: applied.value }, 'Overlay applied');

      return Success(done('Cube Studio deployed to Kubernetes', warnings));
    },

    readiness: {
      description: `deployment ${KUBERNETES.platform.deployment} to become available`,
      check: (ctx) =>
        ctx.kube.deploymentAvailable(KUBERNETES.platform.deployment, KUBERNETES.platform.namespace),
      budget: READINESS.platform,
      onTimeout: 'warn',
    },
  };
}
