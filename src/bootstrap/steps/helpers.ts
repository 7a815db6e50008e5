/**
 * Helpers shared by step definitions.
 */

import { access } from 'node:fs/promises';
import { Success, type Result } from '@/types';
import { projectPath } from '@/config';
import type { BootstrapContext } from '@/core/context';

export async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

export interface ApplySummary {
  applied: string[];
  missing: string[];
}

/**
 * `kubectl apply -f` each project-relative manifest that exists, in order.
 * Missing files are collected, not treated as errors; a failed apply is.
 */
export async function applyManifestsIfPresent(
  ctx: BootstrapContext,
  relativePaths: readonly string[],
): Promise<Result<ApplySummary>> {
  const summary: ApplySummary = { applied: [], missing: [] };

  for (const relative of relativePaths) {
    const path = projectPath(ctx.config, relative);
    if (!(await fileExists(path))) {
      ctx.logger.debug({ path }, 'Manifest not found');
      summary.missing.push(relative);
      continue;
    }

    const applied = await ctx.kube.applyFile(path);
    if (!applied.ok) {
      return applied;
    }
    summary.applied.push(relative);
  }

  return Success(summary);
}

export function pluralize(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}
