/**
 * Child process execution for the command-line tools the bootstrap drives
 * (docker compose, kind, kubectl).
 *
 * Arguments are passed as an array and never through a shell.
 */

import { spawn } from 'node:child_process';
import { access, constants } from 'node:fs/promises';
import { delimiter, join } from 'node:path';
import type { Logger } from 'pino';

export interface CommandOptions {
  cwd?: string;
  /** Written to the child's standard input, which is then closed */
  input?: string;
  timeoutMs?: number;
}

export interface CommandResult {
  /** Process exit code; 127 when the command could not be started */
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface CommandRunner {
  run(command: string, args: readonly string[], options?: CommandOptions): Promise<CommandResult>;
  /** Whether the command resolves to an executable on PATH */
  exists(command: string): Promise<boolean>;
}

export function formatCommand(command: string, args: readonly string[]): string {
  return [command, ...args].join(' ');
}

/**
 * Combined, trimmed output of a command, for error messages.
 */
export function commandOutput(result: CommandResult): string {
  return [result.stderr.trim(), result.stdout.trim()].filter(Boolean).join('\n');
}

const isExecutable = (path: string): Promise<boolean> =>
  access(path, constants.X_OK).then(
    () => true,
    () => false,
  );

export function createCommandRunner(logger: Logger, env: NodeJS.ProcessEnv = process.env): CommandRunner {
  return {
    run(command, args, options = {}) {
      const display = formatCommand(command, args);
      logger.debug({ command: display, cwd: options.cwd }, 'Running command');

      return new Promise<CommandResult>((resolve) => {
        const child = spawn(command, [...args], {
          cwd: options.cwd,
          env,
          timeout: options.timeoutMs,
        });

        let stdout = '';
        let stderr = '';
        let settled = false;

        const finish = (result: CommandResult): void => {
          if (settled) {
            return;
          }
          settled = true;
          logger.debug(
            { command: display, exitCode: result.exitCode, stderr: result.stderr.trim() || undefined },
            'Command finished',
          );
          resolve(result);
        };

        child.stdout.setEncoding('utf-8');
        child.stderr.setEncoding('utf-8');
        child.stdout.on('data', (chunk: string) => {
          stdout += chunk;
        });
        child.stderr.on('data', (chunk: string) => {
          stderr += chunk;
        });

        child.on('error', (error) => {
          finish({ exitCode: 127, stdout, stderr: stderr || error.message });
        });
        child.on('close', (code, signal) => {
          const exitCode = code ?? (signal ? 128 : 1);
          const note = signal ? `${stderr}\nterminated by ${signal}`.trim() : stderr;
          finish({ exitCode, stdout, stderr: note });
        });

        child.stdin.on('error', (error) => {
          logger.debug({ command: display, error: error.message }, 'Standard input closed early');
        });
        child.stdin.end(options.input ?? '');
      });
    },

    async exists(command) {
      const directories = (env.PATH ?? '').split(delimiter).filter(Boolean);
      const extensions =
        process.platform === 'win32' ? (env.PATHEXT ?? '.EXE;.CMD;.BAT').split(';') : [''];

      for (const directory of directories) {
        for (const extension of extensions) {
          if (await isExecutable(join(directory, `${command}${extension}`))) {
            return true;
          }
        }
      }
      return false;
    },
  };
}
