/**
 * MinIO exposure and the MINIO_HOST rewrite.
 *
 * The platform containers run outside the cluster, so they reach MinIO
 * through the kind node address and the API NodePort.
 */

import { Success, type Result } from '@/types';
import { BACKING_SERVICES, CLUSTER, KUBERNETES, PATHS, READINESS, projectPath } from '@/config';
import { pollUntil } from '@/lib/polling';
import { replaceQuotedAssignment, rewriteFile } from '@/lib/config-rewrite';
import type { BootstrapContext } from '@/core/context';
import { minioNodePortService } from '../manifests';
import { done, skipped, type Step, type StepReport } from '../types';
import { fileExists } from './helpers';

async function ensureMinioNodePort(ctx: BootstrapContext): Promise<Result<void>> {
  const { namespace, nodePortService } = KUBERNETES.minio;
  if (await ctx.kube.resourceExists('service', nodePortService, namespace)) {
    ctx.reporter.info('MinIO NodePort service already exists');
    return Success(undefined);
  }

  const applied = await ctx.kube.applyManifest(minioNodePortService());
  if (applied.ok) {
    ctx.reporter.success('MinIO NodePort service created');
  }
  return applied;
}

/**
 * Expose MinIO and point MINIO_HOST at `<node address>:<api node port>`.
 */
export async function exposeMinioAndRewrite(ctx: BootstrapContext): Promise<Result<StepReport>> {
  const exposed = await ensureMinioNodePort(ctx);
  if (!exposed.ok) {
    return exposed;
  }

  const address = await ctx.docker.getNetworkMemberAddress(CLUSTER.network, CLUSTER.nodeName);
  if (!address) {
    return Success(
      skipped('Could not discover the kind node address, MinIO configuration not updated'),
    );
  }
  ctx.snapshot.nodeAddress = address;

  const minioHost = `${address}:${KUBERNETES.minio.apiNodePort}`;
  ctx.reporter.info(`Kind node address: ${address}`);
  ctx.reporter.info(`MinIO address: ${minioHost}`);

  const configPath = projectPath(ctx.config, PATHS.platformConfig);
  if (!(await fileExists(configPath))) {
    return Success(skipped(`${PATHS.platformConfig} not found, MinIO configuration not updated`));
  }

  const field = BACKING_SERVICES.minioHostField;
  const rewritten = await rewriteFile(configPath, [
    (content) => replaceQuotedAssignment(content, field, minioHost),
  ]);
  if (!rewritten.matched) {
    return Success(skipped(`${field} not found in ${PATHS.platformConfig}`));
  }

  ctx.snapshot.minioHost = minioHost;
  return Success(
    done(rewritten.changed ? `${field} set to ${minioHost}` : `${field} already ${minioHost}`),
  );
}

export const updateMinioConfig: Step = {
  id: 'update-minio-config',
  title: 'Updating MinIO configuration',

  async run(ctx) {
    const { namespace, service } = KUBERNETES.minio;
    ctx.reporter.info('Waiting for the MinIO service...');
    const registered = await pollUntil(() => ctx.kube.resourceExists('service', service, namespace), {
      ...READINESS.minioService,
      sleep: ctx.sleep,
      ...(ctx.signal && { signal: ctx.signal }),
    });
    if (!registered.ready) {
      return Success(skipped('MinIO service not found, MinIO configuration not updated'));
    }
    return exposeMinioAndRewrite(ctx);
  },
};

export const exposeMinio: Step = {
  id: 'expose-minio',
  title: 'Exposing MinIO and updating its address',
  run: exposeMinioAndRewrite,
};
