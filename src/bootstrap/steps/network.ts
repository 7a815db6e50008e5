/**
 * Attaching Compose containers to the kind network.
 *
 * Compose containers and the kind node live on different Docker networks.
 * Joining the containers to `kind` lets the platform reach the API server and
 * lets the cluster reach MySQL and Redis.
 */

import { Success } from '@/types';
import { CLUSTER, COMPOSE, PATHS, READINESS, projectPath } from '@/config';
import type { BootstrapContext } from '@/core/context';
import { done, skipped, type Step } from '../types';
import { allRunning } from './compose';
import { pluralize } from './helpers';

interface AttachSummary {
  attached: string[];
  failed: string[];
}

async function attachContainers(
  ctx: BootstrapContext,
  containers: readonly string[],
): Promise<AttachSummary> {
  const summary: AttachSummary = { attached: [], failed: [] };

  for (const container of containers) {
    const attachment = await ctx.docker.connectToNetwork(CLUSTER.network, container);
    if (attachment.ok) {
      summary.attached.push(container);
      if (!ctx.snapshot.attachedContainers.includes(container)) {
        ctx.snapshot.attachedContainers.push(container);
      }
    } else {
      // worker and beat are optional in some Compose profiles
      ctx.logger.debug({ container, error: attachment.error }, 'Container not attached');
      summary.failed.push(container);
    }
  }

  return summary;
}

export const configureNetwork: Step = {
  id: 'configure-network',
  title: 'Configuring container networking',

  async run(ctx) {
    const containers = Object.values(COMPOSE.containers);
    const { attached, failed } = await attachContainers(ctx, containers);

    const toRestart = COMPOSE.restartServices.filter((service) =>
      attached.includes(COMPOSE.containers[service]),
    );
    if (toRestart.length > 0) {
      ctx.reporter.info(`Restarting ${toRestart.join(', ')} to pick up the network change...`);
      const restarted = await ctx.docker.composeRestart(
        projectPath(ctx.config, PATHS.composeDir),
        toRestart,
      );
      if (restarted.ok) {
        ctx.snapshot.restartedContainers = toRestart.map((service) => COMPOSE.containers[service]);
      } else {
        ctx.logger.debug({ error: restarted.error }, 'Restart after network change failed');
      }
    }

    const message = `${pluralize(attached.length, 'container')} attached to the ${CLUSTER.network} network`;
    return Success(
      done(failed.length > 0 ? `${message} (not found: ${failed.join(', ')})` : message),
    );
  },

  readiness: {
    description: 'restarted containers to be running',
    when: (ctx) => ctx.snapshot.restartedContainers.length > 0,
    check: (ctx) => allRunning(ctx, ctx.snapshot.restartedContainers),
    budget: READINESS.containersRunning,
    onTimeout: 'warn',
  },
};

export const connectFrontend: Step = {
  id: 'connect-frontend',
  title: 'Connecting frontend to the kind network',

  guard: {
    description: 'Frontend is already connected to the kind network',
    check: (ctx) => ctx.docker.isConnectedToNetwork(COMPOSE.containers.frontend, CLUSTER.network),
  },

  async run(ctx) {
    const container = COMPOSE.containers.frontend;
    const attachment = await ctx.docker.connectToNetwork(CLUSTER.network, container);
    if (!attachment.ok) {
      return Success(skipped(`Frontend not connected: ${attachment.error}`));
    }
    ctx.snapshot.attachedContainers.push(container);
    return Success(
      done(
        attachment.value === 'connected'
          ? 'Frontend connected to the kind network'
          : 'Frontend was already connected to the kind network',
      ),
    );
  },
};

export const connectBackingServices: Step = {
  id: 'connect-backing-services',
  title: 'Connecting MySQL and Redis to the kind network',

  async run(ctx) {
    const { attached, failed } = await attachContainers(ctx, [
      COMPOSE.containers.mysql,
      COMPOSE.containers.redis,
    ]);
    const message = `${pluralize(attached.length, 'backing service')} on the ${CLUSTER.network} network`;
    return Success(done(failed.length > 0 ? `${message} (not found: ${failed.join(', ')})` : message));
  },
};
