import { describe, it, expect } from '@jest/globals';
import { join } from 'node:path';
import { readFileSync, statSync } from 'node:fs';
import { createProgram } from '@/cli/cli';

describe('CLI Interface', () => {
  const cliPath = join(__dirname, '../../../src/cli/cli.ts');

  describe('CLI file', () => {
    it('should have an executable entry point', () => {
      expect(() => statSync(cliPath)).not.toThrow();

      const content = readFileSync(cliPath, 'utf-8');
      expect(content).toContain('#!/usr/bin/env node');
      expect(content).toContain('require.main === module');
    });

    it('should document the environment variables in the help text', () => {
      const content = readFileSync(cliPath, 'utf-8');

      expect(content).toContain('FORCE_REBUILD_CLUSTER=true');
      expect(content).toContain('CUBE_STUDIO_ROOT=<path>');
      expect(content).toContain('LOG_LEVEL=<level>');
    });
  });

  describe('program', () => {
    it('should expose start and repair commands', () => {
      const program = createProgram();

      expect(program.name()).toBe('cube-bootstrap');
      expect(program.commands.map((command) => command.name())).toEqual(['start', 'repair']);
    });

    it('should report the package version', () => {
      const packageJson: unknown = JSON.parse(
        readFileSync(join(__dirname, '../../../package.json'), 'utf-8'),
      );
      const program = createProgram();

      expect(packageJson).toMatchObject({ version: program.version() });
    });
  });
});
