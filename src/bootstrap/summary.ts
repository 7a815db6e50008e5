/**
 * End-of-run summaries: environment status and access details after a
 * successful run, diagnostics after a failed one.
 */

import { readFile } from 'node:fs/promises';
import type { Result } from '@/types';
import {
  BACKING_SERVICES,
  CLUSTER,
  COMPOSE,
  ENDPOINTS,
  KUBERNETES,
  PATHS,
  projectPath,
} from '@/config';
import { readQuotedAssignment } from '@/lib/config-rewrite';
import { extractErrorMessage } from '@/lib/errors';
import type { BootstrapContext } from '@/core/context';
import type { RunReport } from './types';
import { fileExists } from './steps/helpers';

const DIVIDER = '━'.repeat(78);

function printTable(ctx: BootstrapContext, title: string, table: Result<string>): void {
  ctx.reporter.line(title);
  ctx.reporter.line(table.ok ? table.value : `  (unavailable: ${table.error})`);
  ctx.reporter.line();
}

/**
 * Current MINIO_HOST value in the platform configuration, or null.
 */
export async function currentMinioHost(ctx: BootstrapContext): Promise<string | null> {
  const path = projectPath(ctx.config, PATHS.platformConfig);
  if (!(await fileExists(path))) {
    return null;
  }
  try {
    return readQuotedAssignment(await readFile(path, 'utf-8'), BACKING_SERVICES.minioHostField);
  } catch (error) {
    ctx.logger.warn({ path, error: extractErrorMessage(error) }, 'Could not read the platform configuration');
    return null;
  }
}

export async function printStartSummary(ctx: BootstrapContext, report: RunReport): Promise<void> {
  const { reporter } = ctx;
  const composeDir = projectPath(ctx.config, PATHS.composeDir);

  reporter.section('📊 Environment status');
  printTable(ctx, 'Docker Compose services:', await ctx.docker.composeStatus(composeDir));
  printTable(ctx, 'Kubernetes nodes:', await ctx.kube.describeNodes());
  printTable(ctx, 'Kubernetes pods:', await ctx.kube.describePods());

  const dashboard = await ctx.probe(ENDPOINTS.dashboard);
  if (dashboard.reachable) {
    reporter.success(`K8s Dashboard: ${ENDPOINTS.dashboard}`);
  } else {
    reporter.warning('K8s Dashboard is not ready yet, try again shortly');
  }
  const platform = await ctx.probe(ENDPOINTS.platform);
  if (platform.reachable) {
    reporter.success(`Cube Studio: ${ENDPOINTS.platform}`);
  } else {
    reporter.warning('Cube Studio is not ready yet, try again shortly');
  }

  reporter.section('🎉 Startup complete');
  reporter.line('Access:');
  reporter.line(DIVIDER);
  reporter.line(`  🌐 Cube Studio:          ${ENDPOINTS.platform}`);
  reporter.line(`  📊 K8s Dashboard:        ${ENDPOINTS.dashboard}`);
  reporter.line(`  🤖 Inference service:    ${ENDPOINTS.inference} (optional)`);
  reporter.line(DIVIDER);
  reporter.line();

  const { namespace, serviceAccount, tokenDuration } = KUBERNETES.dashboard;
  const token = await ctx.kube.createToken(namespace, serviceAccount, tokenDuration);
  reporter.line('K8s Dashboard login token:');
  reporter.line(DIVIDER);
  reporter.line(
    token.ok
      ? token.value
      : `  Not available yet; fetch it later with \`kubectl create token -n ${namespace} ${serviceAccount} --duration=${tokenDuration}\``,
  );
  reporter.line(DIVIDER);
  reporter.line();

  if (report.warnings.length > 0) {
    reporter.line(`⚠️  Finished with ${report.warnings.length} warning(s):`);
    for (const warning of report.warnings) {
      reporter.line(`  - ${warning}`);
    }
    reporter.line();
  }

  reporter.line('Common commands:');
  reporter.line(`  - myapp logs:        cd ${composeDir} && docker compose logs -f myapp`);
  reporter.line('  - Kubernetes pods:   kubectl get pods -A');
  reporter.line(`  - Stop services:     cd ${composeDir} && docker compose down`);
  reporter.line();
}

export async function printRepairSummary(ctx: BootstrapContext, report: RunReport): Promise<void> {
  const { reporter } = ctx;
  const composeDir = projectPath(ctx.config, PATHS.composeDir);

  reporter.section('📊 Repair results');

  if (await ctx.docker.isConnectedToNetwork(COMPOSE.containers.frontend, CLUSTER.network)) {
    reporter.success(`Frontend is connected to the ${CLUSTER.network} network`);
  } else {
    reporter.warning(`Frontend is not connected to the ${CLUSTER.network} network`);
  }

  const dashboard = await ctx.probe(ENDPOINTS.dashboardViaProxy, { expectStatus: 200 });
  if (dashboard.reachable) {
    reporter.success('K8s Dashboard is reachable through the platform');
  } else {
    reporter.warning(
      `K8s Dashboard is not reachable through the platform (status ${dashboard.status ?? 'none'})`,
    );
  }

  const minioHost = await currentMinioHost(ctx);
  reporter.info(`📝 Current MinIO address: ${minioHost ?? 'not set'}`);

  if (report.warnings.length > 0) {
    reporter.line();
    reporter.line(`⚠️  Finished with ${report.warnings.length} warning(s):`);
    for (const warning of report.warnings) {
      reporter.line(`  - ${warning}`);
    }
  }

  reporter.line();
  reporter.line('If problems persist, check:');
  reporter.line('  1. The kind cluster is healthy: kubectl get nodes');
  reporter.line(
    `  2. The MinIO service is up: kubectl get svc ${KUBERNETES.minio.service} -n ${KUBERNETES.minio.namespace}`,
  );
  reporter.line(`  3. myapp logs: cd ${composeDir} && docker compose logs -f myapp`);
  reporter.line();
}

export function printFailureSummary(ctx: BootstrapContext, report: RunReport): void {
  const { reporter } = ctx;
  const state = report.state;
  if (state.phase !== 'failed') {
    return;
  }

  const step = report.steps.find((record) => record.id === state.stepId);
  reporter.section('❌ Run failed');
  reporter.error(`Step ${step?.title ?? state.stepId} failed (${state.kind})`);
  reporter.line(`  Error: ${state.error}`);
  if (state.guidance?.hint) {
    reporter.line(`  Hint: ${state.guidance.hint}`);
  }
  if (state.guidance?.resolution) {
    reporter.line(`  Resolution: ${state.guidance.resolution}`);
  }
  reporter.line();
  reporter.line('Diagnostics:');
  reporter.line(`  - Compose services:  cd ${projectPath(ctx.config, PATHS.composeDir)} && docker compose ps`);
  reporter.line('  - kind clusters:     kind get clusters');
  reporter.line('  - Kubernetes nodes:  kubectl get nodes');
  reporter.line('  - Kubernetes pods:   kubectl get pods -A');
  reporter.line('Every step is safe to repeat: fix the cause and re-run.');
  reporter.line();
}
