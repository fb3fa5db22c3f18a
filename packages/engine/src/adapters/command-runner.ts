/**
 * Command Runner
 *
 * Thin wrapper over `execFile` used by the CLI-backed adapters (git,
 * kubectl, terraform). Arguments are passed as an array; nothing goes
 * through a shell.
 *
 * @module @pipewright/engine/adapters/command-runner
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { ConfigurationError, ExternalCallError } from '@pipewright/core';

const execFileAsync = promisify(execFile);

/** Output cap per stream */
const MAX_BUFFER_BYTES = 10 * 1024 * 1024;

export interface CommandOptions {
  cwd?: string;
  /** Added to the inherited environment */
  env?: Record<string, string>;
  signal?: AbortSignal;
  /** Return a non-zero exit as a result instead of throwing */
  allowFailure?: boolean;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface CommandRunner {
  /**
   * Run a command to completion
   *
   * @throws {ExternalCallError} On a non-zero exit (unless allowFailure) or abort
   * @throws {ConfigurationError} If the executable is not installed
   */
  run(command: string, args: string[], options?: CommandOptions): Promise<CommandResult>;
}

interface ExecFailure {
  exitCode: number | null;
  errno?: string;
  stdout: string;
  stderr: string;
  aborted: boolean;
}

function describeFailure(error: unknown): ExecFailure {
  const failure: ExecFailure = { exitCode: null, stdout: '', stderr: '', aborted: false };
  if (typeof error !== 'object' || error === null) {
    return failure;
  }
  if ('code' in error) {
    if (typeof error.code === 'number') failure.exitCode = error.code;
    if (typeof error.code === 'string') failure.errno = error.code;
  }
  if ('stdout' in error && typeof error.stdout === 'string') failure.stdout = error.stdout;
  if ('stderr' in error && typeof error.stderr === 'string') failure.stderr = error.stderr;
  if ('name' in error && error.name === 'AbortError') failure.aborted = true;
  return failure;
}

/**
 * CommandRunner backed by child_process.execFile
 */
export class ExecFileRunner implements CommandRunner {
  async run(command: string, args: string[], options: CommandOptions = {}): Promise<CommandResult> {
    try {
      const { stdout, stderr } = await execFileAsync(command, args, {
        cwd: options.cwd,
        env: options.env ? { ...process.env, ...options.env } : process.env,
        signal: options.signal,
        maxBuffer: MAX_BUFFER_BYTES,
        encoding: 'utf8',
      });
      return { stdout, stderr, exitCode: 0 };
    } catch (error) {
      const failure = describeFailure(error);
      const cause = error instanceof Error ? error : undefined;
      const label = args.length > 0 ? `${command} ${args[0]}` : command;

      if (failure.errno === 'ENOENT') {
        throw new ConfigurationError(`Command not found: ${command}. Is it installed and on PATH?`, { cause });
      }
      if (failure.aborted) {
        throw new ExternalCallError(`${label} was aborted`, command, {
          context: { args },
          cause,
        });
      }
      if (failure.exitCode !== null && options.allowFailure) {
        return { stdout: failure.stdout, stderr: failure.stderr, exitCode: failure.exitCode };
      }

      const detail = failure.stderr.trim() || failure.stdout.trim() || (cause?.message ?? String(error));
      const exit = failure.exitCode !== null ? ` (exit ${failure.exitCode})` : '';
      throw new ExternalCallError(
        `${label} failed${exit}: ${detail}`,
        command,
        { context: { args, exitCode: failure.exitCode, stderr: failure.stderr }, cause }
      );
    }
  }
}
