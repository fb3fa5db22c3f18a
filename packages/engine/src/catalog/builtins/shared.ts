/**
 * Context readers shared by the built-in steps
 *
 * @module @pipewright/engine/catalog/builtins/shared
 */

import { isAbsolute, resolve } from 'node:path';
import { z } from 'zod';
import { ValidationFailureError } from '@pipewright/core';
import type { ContextReader, ContextRecord } from '../../context/execution-context.js';
import { parseRepositoryRef, type PullRequestInfo, type RepositoryRef } from '../../adapters/types.js';

export const PullRequestRecord = z.object({
  number: z.number().int().positive(),
  title: z.string(),
  state: z.enum(['open', 'closed', 'merged']),
  merged: z.boolean(),
  mergeCommitSha: z.string().nullable(),
  baseBranch: z.string(),
  headBranch: z.string(),
  url: z.string(),
  author: z.string(),
});

export function pullRequestRecord(pr: PullRequestInfo): ContextRecord {
  return {
    number: pr.number,
    title: pr.title,
    state: pr.state,
    merged: pr.merged,
    mergeCommitSha: pr.mergeCommitSha,
    baseBranch: pr.baseBranch,
    headBranch: pr.headBranch,
    url: pr.url,
    author: pr.author,
  };
}

/**
 * `repository` context value as owner/name
 *
 * @throws {ValidationFailureError} If malformed
 */
export function readRepository(ctx: ContextReader): RepositoryRef {
  const value = ctx.get('repository');
  const ref = typeof value === 'string' ? parseRepositoryRef(value) : null;
  if (!ref) {
    throw new ValidationFailureError(`Context value "repository" must be "owner/name", got ${JSON.stringify(value)}`, [
      'repository is not owner/name',
    ]);
  }
  return ref;
}

/**
 * `pullRequest` context value written by vcs.inspect-pull-request
 *
 * @throws {ValidationFailureError} If malformed
 */
export function readPullRequest(ctx: ContextReader): PullRequestInfo {
  const result = PullRequestRecord.safeParse(ctx.get('pullRequest'));
  if (!result.success) {
    throw new ValidationFailureError(
      'Context value "pullRequest" is malformed',
      result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`)
    );
  }
  return result.data;
}

/**
 * Namespace param, else the run's `environment` context value
 */
export function namespaceFor(ctx: ContextReader, namespace: string | undefined): string {
  if (namespace) return namespace;
  const environment = ctx.get('environment');
  return typeof environment === 'string' ? environment : String(environment);
}

export function resolveWorkPath(workdir: string | undefined, path: string): string {
  return isAbsolute(path) ? path : resolve(workdir ?? process.cwd(), path);
}
