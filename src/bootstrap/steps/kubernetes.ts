/**
 * Namespaces, RBAC, dashboard, storage and workflow manifests.
 */

import { Success } from '@/types';
import { KUBERNETES, PATHS, READINESS } from '@/config';
import type { BootstrapContext } from '@/core/context';
import { dashboardNodePortService } from '../manifests';
import { done, skipped, type Step } from '../types';
import { applyManifestsIfPresent, pluralize } from './helpers';

export const createNamespaces: Step = {
  id: 'create-namespaces',
  title: 'Creating namespaces',

  async run(ctx) {
    let created = 0;
    for (const namespace of KUBERNETES.namespaces) {
      const outcome = await ctx.kube.ensureNamespace(namespace);
      if (!outcome.ok) {
        return outcome;
      }
      if (outcome.value === 'created') {
        created++;
      }
    }
    const unchanged = KUBERNETES.namespaces.length - created;
    return Success(done(`Namespaces ready (${created} created, ${unchanged} already present)`));
  },
};

export const configureRbac: Step = {
  id: 'configure-rbac',
  title: 'Configuring RBAC',

  async run(ctx) {
    const applied = await applyManifestsIfPresent(ctx, [PATHS.rbac]);
    if (!applied.ok) {
      return applied;
    }
    if (applied.value.applied.length === 0) {
      return Success(skipped('RBAC manifest not found, skipping'));
    }
    return Success(done('RBAC configured'));
  },
};

export const deployDashboard: Step = {
  id: 'deploy-dashboard',
  title: 'Deploying Kubernetes Dashboard',

  async run(ctx) {
    const applied = await applyManifestsIfPresent(ctx, PATHS.dashboardManifests);
    if (!applied.ok) {
      return applied;
    }
    if (applied.value.applied.length === 0) {
      return Success(skipped('Dashboard manifests not found, skipping'));
    }
    return Success(done('Kubernetes Dashboard deployed'));
  },

  readiness: {
    description: 'the dashboard deployment to become available',
    check: (ctx) =>
      ctx.kube.deploymentAvailable(KUBERNETES.dashboard.deployment, KUBERNETES.dashboard.namespace),
    budget: READINESS.dashboard,
    onTimeout: 'warn',
  },
};

async function dashboardExposed(ctx: BootstrapContext): Promise<boolean> {
  const { namespace, nodePortService, defaultService } = KUBERNETES.dashboard;
  return (
    (await ctx.kube.resourceExists('service', nodePortService, namespace)) &&
    !(await ctx.kube.resourceExists('service', defaultService, namespace))
  );
}

/**
 * Replaces the ClusterIP service shipped with the dashboard by a NodePort
 * service on the port kind maps to the host.
 */
export const exposeDashboard: Step = {
  id: 'expose-dashboard',
  title: 'Exposing the dashboard on a NodePort',

  guard: {
    description: `Dashboard NodePort service already on port ${KUBERNETES.dashboard.nodePort}`,
    check: dashboardExposed,
  },

  async run(ctx) {
    const warnings: string[] = [];
    const { namespace, defaultService } = KUBERNETES.dashboard;

    const deleted = await ctx.kube.deleteResource('service', defaultService, namespace);
    if (!deleted.ok) {
      warnings.push(`Default dashboard service not removed: ${deleted.error}`);
    }

    const applied = await ctx.kube.applyManifest(dashboardNodePortService());
    if (!applied.ok) {
      return applied;
    }
    return Success(done(`Dashboard exposed on port ${KUBERNETES.dashboard.nodePort}`, warnings));
  },
};

function applyStep(
  id: string,
  title: string,
  manifests: readonly string[],
  noun: string,
): Step {
  return {
    id,
    title,
    async run(ctx) {
      const applied = await applyManifestsIfPresent(ctx, manifests);
      if (!applied.ok) {
        return applied;
      }
      const { applied: files, missing } = applied.value;
      if (files.length === 0) {
        return Success(skipped(`No ${noun} manifests found, skipping`));
      }
      const warnings = missing.map((path) => `Manifest not found: ${path}`);
      return Success(done(`Applied ${pluralize(files.length, `${noun} manifest`)}`, warnings));
    },
  };
}

export const deployStorage = applyStep(
  'deploy-storage',
  'Creating persistent volumes and claims',
  PATHS.storageManifests,
  'storage',
);

export const deployWorkflows = applyStep(
  'deploy-workflows',
  'Deploying Argo Workflows and MinIO',
  PATHS.workflowManifests,
  'workflow',
);

export const configureDashboardService = applyStep(
  'configure-dashboard-service',
  'Configuring the platform dashboard service',
  [PATHS.dashboardService],
  'dashboard service',
);
