/**
 * The two plans the CLI runs.
 */

import type { Plan } from './types';
import { checkDependencies } from './steps/dependencies';
import { cleanupPreviousRun, restartServices, startComposeStack } from './steps/compose';
import { createCluster, createDataDirectories, labelNode, syncKubeconfig } from './steps/cluster';
import { configureNetwork, connectBackingServices, connectFrontend } from './steps/network';
import {
  configureDashboardService,
  configureRbac,
  createNamespaces,
  deployDashboard,
  deployStorage,
  deployWorkflows,
  exposeDashboard,
} from './steps/kubernetes';
import { exposeMinio, updateMinioConfig } from './steps/minio';
import { deployPlatform } from './steps/platform';

/**
 * Full cold start: Compose stack, kind cluster, in-cluster services and the
 * platform deployment.
 */
export function startPlan(): Plan {
  return {
    name: 'start',
    title: 'Cube Studio Local Development Environment',
    steps: [
      checkDependencies,
      cleanupPreviousRun,
      startComposeStack,
      createCluster,
      syncKubeconfig,
      configureNetwork,
      createNamespaces,
      configureRbac,
      deployDashboard,
      exposeDashboard,
      deployStorage,
      createDataDirectories,
      deployWorkflows,
      updateMinioConfig,
      labelNode,
      configureDashboardService,
      deployPlatform({ backup: true }),
    ],
  };
}

/**
 * Post-restart repair: network attachments, MinIO address and the platform
 * overlay, without touching the cluster itself.
 */
export function repairPlan(): Plan {
  return {
    name: 'repair',
    title: 'Cube Studio Network Repair',
    steps: [
      checkDependencies,
      connectFrontend,
      exposeMinio,
      connectBackingServices,
      deployPlatform({ backup: false }),
      restartServices,
    ],
  };
}
