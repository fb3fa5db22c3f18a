/**
 * Scripted CommandRunner for adapter tests
 */

import { ExternalCallError } from '@pipewright/core';
import type { CommandOptions, CommandResult, CommandRunner } from '../command-runner.js';

export interface RecordedCommand {
  command: string;
  args: string[];
  options: CommandOptions;
}

type Reply = Partial<CommandResult>;

/**
 * Replies are matched by the command line prefix (`kubectl apply`); the
 * longest matching prefix wins. Unmatched commands succeed with no output.
 */
export class FakeCommandRunner implements CommandRunner {
  readonly calls: RecordedCommand[] = [];
  private readonly replies = new Map<string, Reply>();

  reply(prefix: string, result: Reply): this {
    this.replies.set(prefix, result);
    return this;
  }

  commandLines(): string[] {
    return this.calls.map((c) => [c.command, ...c.args].join(' '));
  }

  async run(command: string, args: string[], options: CommandOptions = {}): Promise<CommandResult> {
    this.calls.push({ command, args, options });
    const line = [command, ...args].join(' ');
    const prefix = [...this.replies.keys()]
      .filter((p) => line.startsWith(p))
      .sort((a, b) => b.length - a.length)[0];
    const reply = prefix === undefined ? {} : this.replies.get(prefix);
    const result: CommandResult = { stdout: '', stderr: '', exitCode: 0, ...reply };

    if (result.exitCode !== 0 && !options.allowFailure) {
      throw new ExternalCallError(`${command} ${args[0]} failed (exit ${result.exitCode}): ${result.stderr}`, command);
    }
    return result;
  }
}
