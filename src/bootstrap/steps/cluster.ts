/**
 * Steps acting on the kind cluster and its node.
 */

import { chmod, mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { Success } from '@/types';
import { CLUSTER, KUBERNETES, PATHS, READINESS, projectPath } from '@/config';
import { defaultClusterConfig } from '@/infra/kind/client';
import { failWith } from '@/lib/errors';
import { done, noop, skipped, type Step } from '../types';

/**
 * An existing cluster is reused only when its API server answers.
 */
export const createCluster: Step = {
  id: 'create-cluster',
  title: 'Creating kind Kubernetes cluster',

  async run(ctx) {
    const exists = await ctx.cluster.clusterExists(CLUSTER.name);
    if (exists.ok && exists.value) {
      if (!(await ctx.kube.ping())) {
        return failWith('command-failed', `Kind cluster ${CLUSTER.name} exists but is unreachable`, {
          hint: 'The API server of the existing cluster does not answer',
          resolution: `Delete it with \`kind delete cluster --name ${CLUSTER.name}\` and re-run`,
        });
      }
      return Success(noop(`Kind cluster ${CLUSTER.name} already exists, reusing it`));
    }

    const created = await ctx.cluster.createCluster(CLUSTER.name, defaultClusterConfig());
    if (!created.ok) {
      return created;
    }
    return Success(done(`Kind cluster ${CLUSTER.name} created`));
  },

  readiness: {
    description: `node ${CLUSTER.nodeName} to become Ready`,
    check: (ctx) => ctx.kube.isNodeReady(CLUSTER.nodeName),
    budget: READINESS.clusterNode,
    onTimeout: 'fail',
    resolution: `If the cluster is unhealthy, delete it with \`kind delete cluster --name ${CLUSTER.name}\` and re-run`,
  },
};

/**
 * The in-network kubeconfig lets containers on the kind network reach the
 * API server by the node's container name.
 */
export const syncKubeconfig: Step = {
  id: 'sync-kubeconfig',
  title: 'Syncing kubeconfig',

  async run(ctx) {
    const kubeconfig = await ctx.cluster.getKubeconfig(CLUSTER.name, { internal: true });
    if (!kubeconfig.ok) {
      return kubeconfig;
    }

    const path = projectPath(ctx.config, PATHS.kubeconfig);
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, kubeconfig.value, { encoding: 'utf-8', mode: 0o600 });
    // mode only applies when the file is created
    await chmod(path, 0o600);

    ctx.snapshot.kubeconfigPath = path;
    return Success(done(`Kubeconfig written to ${PATHS.kubeconfig}`));
  },
};

export const createDataDirectories: Step = {
  id: 'create-directories',
  title: 'Creating data directories in the cluster node',

  async run(ctx) {
    const warnings: string[] = [];
    let created = 0;

    for (const directory of CLUSTER.dataDirectories) {
      const path = `${CLUSTER.dataRoot}/${directory}`;
      const result = await ctx.docker.exec(CLUSTER.nodeName, ['mkdir', '-p', path]);
      if (result.ok) {
        created++;
      } else {
        warnings.push(`Could not create ${path}: ${result.error}`);
      }
    }

    return Success(
      done(`${created}/${CLUSTER.dataDirectories.length} data directories present`, warnings),
    );
  },
};

export const labelNode: Step = {
  id: 'label-node',
  title: 'Labelling the cluster node',

  async run(ctx) {
    const labelled = await ctx.kube.labelNode(CLUSTER.nodeName, KUBERNETES.nodeLabels);
    if (!labelled.ok) {
      return Success(skipped(`Node labels not applied: ${labelled.error}`));
    }
    return Success(done(`${Object.keys(KUBERNETES.nodeLabels).length} labels set on ${CLUSTER.nodeName}`));
  },
};
