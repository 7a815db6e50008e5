/**
 * Scripted CommandRunner: answers by matching the joined command line.
 */

import type { CommandOptions, CommandResult, CommandRunner } from '@/infra/process/runner';

export interface RecordedCommand {
  command: string;
  args: readonly string[];
  options: CommandOptions;
}

export interface ScriptedResponse {
  /** Prefix of `command arg1 arg2 ...` */
  match: string;
  result: Partial<CommandResult>;
}

export class FakeCommandRunner implements CommandRunner {
  readonly calls: RecordedCommand[] = [];
  private readonly responses: ScriptedResponse[] = [];

  constructor(private readonly installed: readonly string[] = ['docker', 'kind', 'kubectl']) {}

  on(match: string, result: Partial<CommandResult>): this {
    this.responses.unshift({ match, result });
    return this;
  }

  async run(command: string, args: readonly string[], options: CommandOptions = {}): Promise<CommandResult> {
    this.calls.push({ command, args, options });
    const line = [command, ...args].join(' ');
    const response = this.responses.find((candidate) => line.startsWith(candidate.match));
    return { exitCode: 0, stdout: '', stderr: '', ...response?.result };
  }

  async exists(command: string): Promise<boolean> {
    return this.installed.includes(command);
  }

  lines(): string[] {
    return this.calls.map((call) => [call.command, ...call.args].join(' '));
  }
}
