/**
 * Targeted in-place rewrites of configuration files.
 *
 * Only the value of the targeted field changes. Every other byte of the file,
 * including the rest of the edited line, is left as it was.
 */

import { copyFile, readFile, writeFile } from 'node:fs/promises';

export interface RewriteResult {
  content: string;
  /** The field was found at least once */
  matched: boolean;
  /** The content differs from the input */
  changed: boolean;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function applyPattern(content: string, pattern: RegExp, replacer: (...groups: string[]) => string) {
  let matched = false;
  const next = content.replace(pattern, (...args: unknown[]) => {
    matched = true;
    const groups = args.slice(1).filter((group): group is string => typeof group === 'string');
    return replacer(...groups);
  });
  return { content: next, matched, changed: next !== content };
}

/**
 * Rewrite the quoted value of a Python-style assignment.
 *
 * @example
 * replaceQuotedAssignment("MINIO_HOST = 'minio:9000'  # api", 'MINIO_HOST', '172.18.0.2:30900')
 * // => "MINIO_HOST = '172.18.0.2:30900'  # api"
 */
export function replaceQuotedAssignment(
  content: string,
  field: string,
  value: string,
): RewriteResult {
  const pattern = new RegExp(`^([ \\t]*${escapeRegExp(field)}[ \\t]*=[ \\t]*)(['"])(.*?)\\2`, 'gm');
  return applyPattern(content, pattern, (prefix, quote) => `${prefix}${quote}${value}${quote}`);
}

/**
 * Rewrite every `KEY=value` occurrence, as found in kustomize literals.
 *
 * The value ends at the first whitespace or quote character, so surrounding
 * quotes and trailing comments survive.
 */
export function replaceEnvAssignment(content: string, key: string, value: string): RewriteResult {
  const pattern = new RegExp(`(^|[^A-Za-z0-9_])(${escapeRegExp(key)}=)[^\\s'"]*`, 'gm');
  return applyPattern(content, pattern, (boundary, assignment) => `${boundary}${assignment}${value}`);
}

/**
 * Strip carriage returns at the end of lines.
 */
export function normalizeLineEndings(content: string): RewriteResult {
  const next = content.replace(/\r(?=\n|$)/g, '');
  return { content: next, matched: next !== content, changed: next !== content };
}

/**
 * Read the value of a quoted assignment, or null when the field is absent.
 */
export function readQuotedAssignment(content: string, field: string): string | null {
  const pattern = new RegExp(`^[ \\t]*${escapeRegExp(field)}[ \\t]*=[ \\t]*(['"])(.*?)\\1`, 'm');
  const match = pattern.exec(content);
  return match?.[2] ?? null;
}

export interface RewriteFileOptions {
  /** Copy the original to `<path>.bak` before writing */
  backup?: boolean;
}

/**
 * Apply one or more transforms to a file, writing only when something changed.
 */
export async function rewriteFile(
  path: string,
  transforms: Array<(content: string) => RewriteResult>,
  options: RewriteFileOptions = {},
): Promise<RewriteResult> {
  const original = await readFile(path, 'utf-8');

  let content = original;
  let matched = true;
  for (const transform of transforms) {
    const result = transform(content);
    content = result.content;
    matched = matched && result.matched;
  }

  const changed = content !== original;
  if (changed) {
    if (options.backup) {
      await copyFile(path, `${path}.bak`);
    }
    await writeFile(path, content, 'utf-8');
  }

  return { content, matched, changed };
}
