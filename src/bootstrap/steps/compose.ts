/**
 * Steps acting on the Docker Compose stack.
 */

import { Success } from '@/types';
import { CLUSTER, COMPOSE, PATHS, READINESS, projectPath } from '@/config';
import type { BootstrapContext } from '@/core/context';
import { done, skipped, type Step } from '../types';
import { fileExists } from './helpers';

async function clusterListed(ctx: BootstrapContext): Promise<boolean> {
  const exists = await ctx.cluster.clusterExists(CLUSTER.name);
  return exists.ok && exists.value;
}

export async function allRunning(ctx: BootstrapContext, containers: readonly string[]): Promise<boolean> {
  for (const container of containers) {
    const state = await ctx.docker.containerState(container);
    if (!state?.running) {
      return false;
    }
  }
  return true;
}

/**
 * Stops the Compose stack. The kind cluster is kept, so its images are not
 * pulled again, unless a rebuild is forced.
 */
export const cleanupPreviousRun: Step = {
  id: 'cleanup',
  title: 'Cleaning up previous run',

  async run(ctx) {
    const warnings: string[] = [];
    const composeDir = projectPath(ctx.config, PATHS.composeDir);

    if (await fileExists(projectPath(ctx.config, PATHS.composeFile))) {
      ctx.reporter.info('Stopping Docker Compose services...');
      const down = await ctx.docker.composeDown(composeDir);
      if (!down.ok) {
        warnings.push(`Could not stop Docker Compose services: ${down.error}`);
      }
    }

    const exists = await clusterListed(ctx);
    if (!exists) {
      return Success(done('No previous kind cluster found', warnings));
    }

    if (!ctx.config.forceRebuildCluster) {
      ctx.reporter.info(`Existing kind cluster ${CLUSTER.name} will be reused`);
      ctx.reporter.info('Set FORCE_REBUILD_CLUSTER=true to delete and recreate it');
      return Success(done('Previous run cleaned up, cluster kept', warnings));
    }

    ctx.reporter.warning(`Force deleting kind cluster ${CLUSTER.name}...`);
    const deleted = await ctx.cluster.deleteCluster(CLUSTER.name);
    if (!deleted.ok) {
      return deleted;
    }
    return Success(done(`Kind cluster ${CLUSTER.name} deleted`, warnings));
  },

  readiness: {
    description: `kind cluster ${CLUSTER.name} to be removed`,
    when: (ctx) => ctx.config.forceRebuildCluster,
    check: async (ctx) => !(await clusterListed(ctx)),
    budget: READINESS.clusterDeleted,
    onTimeout: 'fail',
    resolution: `Remove the node container with \`docker rm -f ${CLUSTER.nodeName}\` and re-run`,
  },
};

export const startComposeStack: Step = {
  id: 'compose-up',
  title: 'Starting Docker Compose services',

  async run(ctx) {
    const up = await ctx.docker.composeUp(projectPath(ctx.config, PATHS.composeDir));
    if (!up.ok) {
      return up;
    }
    return Success(done('Docker Compose services started'));
  },

  readiness: {
    description: 'MySQL to report healthy',
    check: async (ctx) =>
      (await ctx.docker.containerState(COMPOSE.containers.mysql))?.health === 'healthy',
    budget: READINESS.mysql,
    onTimeout: 'fail',
    resolution: 'Inspect the database with `docker compose logs mysql` in install/docker',
  },
};

export const restartServices: Step = {
  id: 'restart-services',
  title: 'Restarting myapp and frontend services',

  async run(ctx) {
    const restarted = await ctx.docker.composeRestart(
      projectPath(ctx.config, PATHS.composeDir),
      COMPOSE.restartServices,
    );
    if (!restarted.ok) {
      return Success(skipped(`Could not restart services: ${restarted.error}`));
    }
    ctx.snapshot.restartedContainers = [COMPOSE.containers.myapp, COMPOSE.containers.frontend];
    return Success(done('Services restarted'));
  },

  readiness: {
    description: 'restarted services to be running',
    when: (ctx) => ctx.snapshot.restartedContainers.length > 0,
    check: (ctx) => allRunning(ctx, ctx.snapshot.restartedContainers),
    budget: READINESS.containersRunning,
    onTimeout: 'warn',
  },
};
