/**
 * Dependency check: every external tool must be present before anything is
 * mutated.
 */

import { Success } from '@/types';
import { failWith } from '@/lib/errors';
import { done, type Step } from '../types';

export const checkDependencies: Step = {
  id: 'check-dependencies',
  title: 'Checking system dependencies',

  async run(ctx) {
    const engine = await ctx.docker.ping();
    if (!engine.ok) {
      return failWith('dependency-missing', 'Docker is not installed or not running', {
        hint: engine.guidance?.hint ?? engine.error,
        resolution: engine.guidance?.resolution ?? 'Install Docker and start the daemon',
      });
    }

    if (!(await ctx.docker.composeAvailable())) {
      return failWith('dependency-missing', 'Docker Compose is not installed or not compatible', {
        hint: '`docker compose version` did not succeed',
        resolution: 'Install the Docker Compose v2 plugin',
      });
    }

    if (!(await ctx.cluster.isInstalled())) {
      return failWith('dependency-missing', 'kind is not installed', {
        hint: 'No `kind` executable on PATH',
        resolution: 'Install kind: https://kind.sigs.k8s.io/docs/user/quick-start/#installation',
      });
    }

    if (!(await ctx.kube.isInstalled())) {
      return failWith('dependency-missing', 'kubectl is not installed', {
        hint: 'No `kubectl` executable on PATH',
        resolution: 'Install kubectl: https://kubernetes.io/docs/tasks/tools/',
      });
    }

    return Success(done(`All dependencies available (Docker ${engine.value})`));
  },
};
