/**
 * kubectl Orchestration Plane
 *
 * @module @pipewright/engine/adapters/kubectl
 */

import { ExternalCallError } from '@pipewright/core';
import type { CommandRunner } from './command-runner.js';
import type { ApplyManifestsOptions, OrchestrationPlane, RolloutStatus } from './types.js';

export interface KubectlPlaneOptions {
  /** kubectl binary (default: kubectl) */
  binary?: string;
  /** kubeconfig context to target */
  context?: string;
  cwd?: string;
}

export class KubectlPlane implements OrchestrationPlane {
  private readonly binary: string;

  constructor(
    private readonly runner: CommandRunner,
    private readonly options: KubectlPlaneOptions = {}
  ) {
    this.binary = options.binary ?? 'kubectl';
  }

  private kubectl(args: string[], signal?: AbortSignal, allowFailure = false) {
    const contextArgs = this.options.context ? ['--context', this.options.context] : [];
    return this.runner.run(this.binary, [...contextArgs, ...args], {
      cwd: this.options.cwd,
      signal,
      allowFailure,
    });
  }

  async validateManifests(paths: string[], signal?: AbortSignal): Promise<string[]> {
    const violations: string[] = [];
    for (const path of paths) {
      const result = await this.kubectl(['apply', '--dry-run=client', '-f', path], signal, true);
      if (result.exitCode !== 0) {
        violations.push(`Invalid manifest ${path}: ${result.stderr.trim() || `exit ${result.exitCode}`}`);
      }
    }
    return violations;
  }

  async applyManifests(paths: string[], namespace: string, options: ApplyManifestsOptions = {}): Promise<string[]> {
    const args = ['apply', '--namespace', namespace];
    if (options.dryRun) {
      args.push('--dry-run=server');
    }
    for (const path of paths) {
      args.push('-f', path);
    }
    const { stdout } = await this.kubectl(args, options.signal);
    return stdout
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
  }

  async rolloutStatus(
    resource: string,
    namespace: string,
    timeoutSeconds: number,
    signal?: AbortSignal
  ): Promise<RolloutStatus> {
    const result = await this.kubectl(
      ['rollout', 'status', resource, '--namespace', namespace, `--timeout=${timeoutSeconds}s`],
      signal,
      true
    );
    if (result.exitCode === 0) {
      return { ready: true, message: result.stdout.trim() };
    }
    return { ready: false, message: result.stderr.trim() || result.stdout.trim() };
  }

  async getReplicas(resource: string, namespace: string, signal?: AbortSignal): Promise<number> {
    const { stdout } = await this.kubectl(
      ['get', resource, '--namespace', namespace, '-o', 'jsonpath={.spec.replicas}'],
      signal
    );
    const replicas = Number.parseInt(stdout.trim(), 10);
    if (Number.isNaN(replicas)) {
      throw new ExternalCallError(`Could not read replicas of ${resource}: "${stdout.trim()}"`, this.binary);
    }
    return replicas;
  }

  async scale(resource: string, namespace: string, replicas: number, signal?: AbortSignal): Promise<void> {
    await this.kubectl(['scale', resource, '--namespace', namespace, `--replicas=${replicas}`], signal);
  }
}
