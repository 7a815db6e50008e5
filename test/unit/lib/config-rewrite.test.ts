import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import type { DirResult } from 'tmp';
import {
  normalizeLineEndings,
  readQuotedAssignment,
  replaceEnvAssignment,
  replaceQuotedAssignment,
  rewriteFile,
} from '@/lib/config-rewrite';
import { createTestTempDir } from '../../__support__/utilities/tmp-helpers';

describe('replaceQuotedAssignment', () => {
  const config = [
    'import os',
    "MINIO_HOST = 'minio.kubeflow:9000'  # object storage",
    "MINIO_ACCESS_KEY = 'minio'",
    '',
  ].join('\n');

  it('should replace only the quoted value', () => {
    const result = replaceQuotedAssignment(config, 'MINIO_HOST', '172.18.0.2:30900');

    expect(result.matched).toBe(true);
    expect(result.changed).toBe(true);
    expect(result.content).toBe(
      [
        'import os',
        "MINIO_HOST = '172.18.0.2:30900'  # object storage",
        "MINIO_ACCESS_KEY = 'minio'",
        '',
      ].join('\n'),
    );
  });

  it('should be a no-op when the value is already present', () => {
    const once = replaceQuotedAssignment(config, 'MINIO_HOST', '172.18.0.2:30900').content;
    const twice = replaceQuotedAssignment(once, 'MINIO_HOST', '172.18.0.2:30900');

    expect(twice).toEqual({ content: once, matched: true, changed: false });
  });

  it('should keep double quotes and indentation', () => {
    const result = replaceQuotedAssignment('    MINIO_HOST="old"\n', 'MINIO_HOST', 'new');

    expect(result.content).toBe('    MINIO_HOST="new"\n');
  });

  it('should not touch fields that merely share a prefix', () => {
    const result = replaceQuotedAssignment("MINIO_HOST_EXTERNAL = 'x'\n", 'MINIO_HOST', 'y');

    expect(result).toEqual({ content: "MINIO_HOST_EXTERNAL = 'x'\n", matched: false, changed: false });
  });

  it('should report a missing field', () => {
    expect(replaceQuotedAssignment('DEBUG = True\n', 'MINIO_HOST', 'x').matched).toBe(false);
  });
});

describe('replaceEnvAssignment', () => {
  it('should replace the value up to whitespace and keep the line prefix', () => {
    const content = '      - REDIS_HOST=redis.infra\n      - REDIS_PORT=6379\n';

    const result = replaceEnvAssignment(content, 'REDIS_HOST', '172.18.0.6');

    expect(result.content).toBe('      - REDIS_HOST=172.18.0.6\n      - REDIS_PORT=6379\n');
  });

  it('should stop at a closing quote', () => {
    const result = replaceEnvAssignment('  - "MYSQL_SERVICE=old"\n', 'MYSQL_SERVICE', 'new');

    expect(result.content).toBe('  - "MYSQL_SERVICE=new"\n');
  });

  it('should not match a key embedded in a longer name', () => {
    const result = replaceEnvAssignment('- OLD_REDIS_HOST=a\n', 'REDIS_HOST', 'b');

    expect(result.matched).toBe(false);
    expect(result.content).toBe('- OLD_REDIS_HOST=a\n');
  });
});

describe('normalizeLineEndings', () => {
  it('should strip carriage returns at line ends only', () => {
    const result = normalizeLineEndings('a\r\nb\rc\r\nd\r');

    expect(result.content).toBe('a\nb\rc\nd');
    expect(result.changed).toBe(true);
  });
});

describe('readQuotedAssignment', () => {
  it('should read the current value', () => {
    expect(readQuotedAssignment("X = 1\nMINIO_HOST = 'a:1'\n", 'MINIO_HOST')).toBe('a:1');
  });

  it('should return null when the field is absent', () => {
    expect(readQuotedAssignment('X = 1\n', 'MINIO_HOST')).toBeNull();
  });
});

describe('rewriteFile', () => {
  let dir: DirResult;
  let path: string;

  beforeEach(() => {
    dir = createTestTempDir();
    path = join(dir.name, 'kustomization.yml');
    writeFileSync(path, '- REDIS_HOST=old\n- MYSQL_SERVICE=old\n');
  });

  afterEach(() => {
    dir.removeCallback();
  });

  it('should apply every transform and keep a backup of the original', async () => {
    const result = await rewriteFile(
      path,
      [
        (content) => replaceEnvAssignment(content, 'REDIS_HOST', 'r'),
        (content) => replaceEnvAssignment(content, 'MYSQL_SERVICE', 'm'),
      ],
      { backup: true },
    );

    expect(result).toMatchObject({ matched: true, changed: true });
    expect(readFileSync(path, 'utf-8')).toBe('- REDIS_HOST=r\n- MYSQL_SERVICE=m\n');
    expect(readFileSync(`${path}.bak`, 'utf-8')).toBe('- REDIS_HOST=old\n- MYSQL_SERVICE=old\n');
  });

  it('should report unmatched when any transform misses', async () => {
    const result = await rewriteFile(path, [
      (content) => replaceEnvAssignment(content, 'REDIS_HOST', 'r'),
      (content) => replaceEnvAssignment(content, 'MISSING_KEY', 'x'),
    ]);

    expect(result.matched).toBe(false);
    expect(result.changed).toBe(true);
  });

  it('should neither write nor back up when nothing changes', async () => {
    const result = await rewriteFile(
      path,
      [(content) => replaceEnvAssignment(content, 'REDIS_HOST', 'old')],
      { backup: true },
    );

    expect(result.changed).toBe(false);
    expect(existsSync(`${path}.bak`)).toBe(false);
  });
});
