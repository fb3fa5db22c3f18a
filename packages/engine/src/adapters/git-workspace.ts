/**
 * Git Workspace
 *
 * Local git operations for building a revert branch: fetch the base branch,
 * branch from it, revert a merge commit against its first parent, push.
 *
 * @module @pipewright/engine/adapters/git-workspace
 */

import { PipewrightError } from '@pipewright/core';
import type { CommandRunner } from './command-runner.js';

export interface GitWorkspaceOptions {
  /** Repository checkout to operate in */
  workdir: string;
  /** Remote to fetch from and push to (default: origin) */
  remote?: string;
}

export interface RevertCommitOptions {
  branch: string;
  baseBranch: string;
  commitSha: string;
  message: string;
  signal?: AbortSignal;
}

export class GitWorkspace {
  private readonly workdir: string;
  private readonly remote: string;

  constructor(
    private readonly runner: CommandRunner,
    options: GitWorkspaceOptions
  ) {
    this.workdir = options.workdir;
    this.remote = options.remote ?? 'origin';
  }

  private async git(args: string[], signal?: AbortSignal, allowFailure = false) {
    return this.runner.run('git', args, { cwd: this.workdir, signal, allowFailure });
  }

  /**
   * Whether the branch exists on the remote
   */
  async remoteBranchExists(branch: string, signal?: AbortSignal): Promise<boolean> {
    const { stdout } = await this.git(['ls-remote', '--heads', this.remote, branch], signal);
    return stdout.trim().length > 0;
  }

  /**
   * Create `branch` from the remote base, revert the merge commit on it and push
   *
   * A conflicting revert is aborted and reported; the branch is left behind
   * locally so an operator can resolve it by hand.
   */
  async revertOntoBranch(options: RevertCommitOptions): Promise<void> {
    const { branch, baseBranch, commitSha, message, signal } = options;

    await this.git(['fetch', this.remote, baseBranch], signal);
    await this.git(['checkout', '-B', branch, `${this.remote}/${baseBranch}`], signal);

    const reverted = await this.git(['revert', '--no-commit', '-m', '1', commitSha], signal, true);
    if (reverted.exitCode !== 0) {
      await this.git(['revert', '--abort'], signal, true);
      // Conflicts do not go away on retry
      throw new PipewrightError(
        `Reverting ${commitSha} onto ${baseBranch} failed: ${reverted.stderr.trim() || 'conflicts'}`,
        { code: 'EXTERNAL_CALL_FAILURE', retryable: false, context: { service: 'git', branch, commitSha } }
      );
    }

    await this.git(['commit', '-m', message], signal);
    await this.git(['push', '--set-upstream', this.remote, branch], signal);
  }
}
