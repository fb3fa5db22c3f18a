/**
 * Terraform Infrastructure Tool
 *
 * Runs terraform non-interactively in a configuration directory.
 *
 * @module @pipewright/engine/adapters/terraform
 */

import type { CommandRunner } from './command-runner.js';
import type { InfrastructurePlan, InfrastructureTool, InfrastructureValidation } from './types.js';

export interface TerraformToolOptions {
  /** terraform binary (default: terraform) */
  binary?: string;
}

const PLAN_SUMMARY = /Plan: (\d+) to add, (\d+) to change, (\d+) to destroy/;
const NO_CHANGES = /No changes\./;

function varArgs(variables: Record<string, string>): string[] {
  return Object.entries(variables).flatMap(([key, value]) => ['-var', `${key}=${value}`]);
}

export class TerraformTool implements InfrastructureTool {
  private readonly binary: string;

  constructor(
    private readonly runner: CommandRunner,
    options: TerraformToolOptions = {}
  ) {
    this.binary = options.binary ?? 'terraform';
  }

  private terraform(directory: string, args: string[], signal?: AbortSignal, allowFailure = false) {
    return this.runner.run(this.binary, args, {
      cwd: directory,
      env: { TF_IN_AUTOMATION: '1' },
      signal,
      allowFailure,
    });
  }

  async validate(directory: string, signal?: AbortSignal): Promise<InfrastructureValidation> {
    const diagnostics: string[] = [];

    const fmt = await this.terraform(directory, ['fmt', '-check', '-recursive'], signal, true);
    if (fmt.exitCode !== 0) {
      const files = fmt.stdout.split('\n').map((l) => l.trim()).filter(Boolean);
      diagnostics.push(files.length > 0 ? `Not formatted: ${files.join(', ')}` : 'terraform fmt -check failed');
    }

    await this.terraform(directory, ['init', '-backend=false', '-input=false'], signal);
    const validated = await this.terraform(directory, ['validate', '-no-color'], signal, true);
    if (validated.exitCode !== 0) {
      diagnostics.push((validated.stderr.trim() || validated.stdout.trim()) || 'terraform validate failed');
    }

    return { valid: diagnostics.length === 0, diagnostics };
  }

  async plan(directory: string, variables: Record<string, string>, signal?: AbortSignal): Promise<InfrastructurePlan> {
    await this.terraform(directory, ['init', '-input=false'], signal);
    const { stdout } = await this.terraform(
      directory,
      ['plan', '-input=false', '-no-color', ...varArgs(variables)],
      signal
    );
    return parsePlanOutput(stdout);
  }

  async apply(directory: string, variables: Record<string, string>, signal?: AbortSignal): Promise<{ summary: string }> {
    await this.terraform(directory, ['init', '-input=false'], signal);
    const { stdout } = await this.terraform(
      directory,
      ['apply', '-input=false', '-auto-approve', '-no-color', ...varArgs(variables)],
      signal
    );
    const summary = stdout.split('\n').find((line) => line.startsWith('Apply complete!'));
    return { summary: summary?.trim() ?? 'Apply complete' };
  }
}

/**
 * Count changes in `terraform plan` output
 */
export function parsePlanOutput(stdout: string): InfrastructurePlan {
  const match = stdout.match(PLAN_SUMMARY);
  if (match) {
    const changes = Number(match[1]) + Number(match[2]) + Number(match[3]);
    return { changes, summary: match[0] };
  }
  if (NO_CHANGES.test(stdout)) {
    return { changes: 0, summary: 'No changes' };
  }
  return { changes: null, summary: 'Plan produced no summary' };
}
