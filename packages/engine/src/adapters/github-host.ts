/**
 * GitHub Host
 *
 * VersionControlHost backed by the GitHub REST API (octokit) for reads and
 * pull requests, and a local GitWorkspace for the revert itself.
 *
 * @module @pipewright/engine/adapters/github-host
 */

import { Octokit } from 'octokit';
import {
  ConfigurationError,
  ExternalCallError,
  PipewrightError,
  ValidationFailureError,
} from '@pipewright/core';
import type { GitWorkspace } from './git-workspace.js';
import type {
  OpenPullRequestRequest,
  OpenedPullRequest,
  PullRequestInfo,
  RepositoryRef,
  RevertBranchRequest,
  VersionControlHost,
} from './types.js';
import { formatRepositoryRef } from './types.js';

export interface GitHubHostConfig {
  token?: string;
  /** GitHub Enterprise API root */
  baseUrl?: string;
  workspace: GitWorkspace;
  /** Injected for tests; defaults to global fetch */
  fetch?: typeof fetch;
}

function statusOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

/**
 * Classify an API failure: auth problems are configuration errors, client
 * errors are permanent, everything else may be retried
 */
function toHostError(error: unknown, action: string): PipewrightError {
  if (error instanceof PipewrightError) {
    return error;
  }
  const status = statusOf(error);
  const cause = error instanceof Error ? error : undefined;
  const reason = cause?.message ?? String(error);

  if (status === 401 || status === 403) {
    return new ConfigurationError(`GitHub rejected the credentials while trying to ${action} (${status}): ${reason}`, {
      cause,
    });
  }
  if (status !== undefined && status >= 400 && status < 500 && status !== 429) {
    return new PipewrightError(`GitHub could not ${action} (${status}): ${reason}`, {
      code: 'EXTERNAL_CALL_FAILURE',
      retryable: false,
      context: { service: 'github', status },
      cause,
    });
  }
  return new ExternalCallError(`GitHub call failed while trying to ${action}: ${reason}`, 'github', {
    context: { status },
    cause,
  });
}

export class GitHubHost implements VersionControlHost {
  private readonly octokit: Octokit;
  private readonly workspace: GitWorkspace;

  constructor(config: GitHubHostConfig) {
    if (!config.token) {
      throw new ConfigurationError('GitHub token is required. Set GITHUB_TOKEN or github.token in config.');
    }
    this.octokit = new Octokit({
      auth: config.token,
      ...(config.baseUrl ? { baseUrl: config.baseUrl } : {}),
      ...(config.fetch ? { request: { fetch: config.fetch } } : {}),
    });
    this.workspace = config.workspace;
  }

  async getPullRequest(repository: RepositoryRef, number: number, signal?: AbortSignal): Promise<PullRequestInfo> {
    try {
      const { data: pr } = await this.octokit.rest.pulls.get({
        owner: repository.owner,
        repo: repository.name,
        pull_number: number,
        request: { signal },
      });

      return {
        number: pr.number,
        title: pr.title,
        state: pr.merged ? 'merged' : pr.state === 'open' ? 'open' : 'closed',
        merged: pr.merged,
        mergeCommitSha: pr.merged ? pr.merge_commit_sha : null,
        baseBranch: pr.base.ref,
        headBranch: pr.head.ref,
        url: pr.html_url,
        author: pr.user?.login ?? 'unknown',
      };
    } catch (error) {
      if (statusOf(error) === 404) {
        throw new ValidationFailureError(
          `Pull request #${number} not found in ${formatRepositoryRef(repository)}`,
          [`pull request #${number} does not exist`]
        );
      }
      throw toHostError(error, `read pull request #${number}`);
    }
  }

  async branchExists(repository: RepositoryRef, branch: string, signal?: AbortSignal): Promise<boolean> {
    try {
      await this.octokit.rest.repos.getBranch({
        owner: repository.owner,
        repo: repository.name,
        branch,
        request: { signal },
      });
      return true;
    } catch (error) {
      if (statusOf(error) === 404) {
        return false;
      }
      throw toHostError(error, `look up branch ${branch}`);
    }
  }

  async createRevertBranch(request: RevertBranchRequest, signal?: AbortSignal): Promise<void> {
    await this.workspace.revertOntoBranch({
      branch: request.branch,
      baseBranch: request.baseBranch,
      commitSha: request.commitSha,
      message: request.message,
      signal,
    });
  }

  async findOpenPullRequest(
    repository: RepositoryRef,
    head: string,
    signal?: AbortSignal
  ): Promise<OpenedPullRequest | null> {
    try {
      const { data } = await this.octokit.rest.pulls.list({
        owner: repository.owner,
        repo: repository.name,
        head: `${repository.owner}:${head}`,
        state: 'open',
        per_page: 1,
        request: { signal },
      });
      const [pr] = data;
      return pr ? { number: pr.number, url: pr.html_url } : null;
    } catch (error) {
      throw toHostError(error, `list pull requests for ${head}`);
    }
  }

  async openPullRequest(request: OpenPullRequestRequest, signal?: AbortSignal): Promise<OpenedPullRequest> {
    try {
      const { data: pr } = await this.octokit.rest.pulls.create({
        owner: request.repository.owner,
        repo: request.repository.name,
        head: request.head,
        base: request.base,
        title: request.title,
        body: request.body,
        draft: request.draft ?? false,
        request: { signal },
      });
      return { number: pr.number, url: pr.html_url };
    } catch (error) {
      throw toHostError(error, `open a pull request from ${request.head}`);
    }
  }

  async addLabels(repository: RepositoryRef, number: number, labels: string[], signal?: AbortSignal): Promise<void> {
    try {
      await this.octokit.rest.issues.addLabels({
        owner: repository.owner,
        repo: repository.name,
        issue_number: number,
        labels,
        request: { signal },
      });
    } catch (error) {
      throw toHostError(error, `label pull request #${number}`);
    }
  }
}
