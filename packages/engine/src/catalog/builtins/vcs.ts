/**
 * Version-control steps: inspect a pull request, require it merged, build a
 * revert branch and open a pull request for it.
 *
 * @module @pipewright/engine/catalog/builtins/vcs
 */

import { z } from 'zod';
import { ValidationFailureError } from '@pipewright/core';
import { formatRepositoryRef } from '../../adapters/types.js';
import type { ContextReader } from '../../context/execution-context.js';
import { analyzeStep, mutatingStep, validationStep } from '../../step-contract/factories.js';
import { defineStep, type StepFactory, type StepServices } from '../types.js';
import { pullRequestRecord, readPullRequest, readRepository } from './shared.js';

const NoParams = z.object({}).strict();

const PullRequestNumber = z.coerce.number().int().positive();

export const DEFAULT_REVERT_BRANCH_PREFIX = 'revert-pr-';

export function vcsSteps(services: StepServices): StepFactory[] {
  const inspectPullRequest = defineStep({
    id: 'vcs.inspect-pull-request',
    kind: 'analyze',
    summary: 'Read a pull request and record its state as "pullRequest"',
    params: NoParams,
    build: ({ name, description }) =>
      analyzeStep({
        name,
        description,
        requires: ['repository', 'pullRequestNumber'],
        produces: ['pullRequest'],
        analyze: async (ctx) => {
          const repository = readRepository(ctx);
          const parsed = PullRequestNumber.safeParse(ctx.get('pullRequestNumber'));
          if (!parsed.success) {
            throw new ValidationFailureError(
              `Context value "pullRequestNumber" must be a positive integer, got ${JSON.stringify(ctx.get('pullRequestNumber'))}`,
              ['pullRequestNumber is not a positive integer']
            );
          }

          const pr = await services.vcs().getPullRequest(repository, parsed.data, ctx.signal);
          ctx.set('pullRequest', pullRequestRecord(pr));
          return `${formatRepositoryRef(repository)}#${pr.number} "${pr.title}" is ${pr.state}`;
        },
      }),
  });

  const requireMerged = defineStep({
    id: 'vcs.require-merged',
    kind: 'validation',
    summary: 'Fail unless the pull request is merged with a merge commit',
    params: NoParams,
    build: ({ name, description }) =>
      validationStep({
        name,
        description,
        requires: ['pullRequest'],
        check: async (ctx) => {
          const pr = readPullRequest(ctx);
          const violations: string[] = [];
          if (!pr.merged) {
            violations.push(`Pull request #${pr.number} is ${pr.state}, not merged`);
          } else if (!pr.mergeCommitSha) {
            violations.push(`Pull request #${pr.number} has no merge commit`);
          }
          return violations;
        },
      }),
  });

  const createRevertBranch = defineStep({
    id: 'vcs.create-revert-branch',
    kind: 'mutating',
    summary: 'Create and push revert-pr-<n> reverting the merge commit',
    params: z
      .object({
        branchPrefix: z.string().min(1).default(DEFAULT_REVERT_BRANCH_PREFIX),
        message: z.string().optional(),
      })
      .strict(),
    build: ({ name, description, params }) => {
      const branchFor = (ctx: ContextReader) => {
        const pr = readPullRequest(ctx);
        return `${params(ctx).branchPrefix}${pr.number}`;
      };

      return mutatingStep({
        name,
        description,
        requires: ['repository', 'pullRequest'],
        produces: ['revertBranch'],
        probe: async (ctx) => {
          const branch = branchFor(ctx);
          if (await services.vcs().branchExists(readRepository(ctx), branch, ctx.signal)) {
            ctx.set('revertBranch', branch);
            return { applied: true, message: `Branch ${branch} already exists` };
          }
          return { applied: false };
        },
        preview: async (ctx) => {
          const branch = branchFor(ctx);
          ctx.set('revertBranch', branch);
          return `Dry run: would create ${branch}`;
        },
        apply: async (ctx) => {
          const repository = readRepository(ctx);
          const pr = readPullRequest(ctx);
          const branch = branchFor(ctx);
          if (!pr.mergeCommitSha) {
            throw new ValidationFailureError(`Pull request #${pr.number} has no merge commit to revert`, [
              'no merge commit',
            ]);
          }

          await services.vcs().createRevertBranch(
            {
              repository,
              branch,
              baseBranch: pr.baseBranch,
              commitSha: pr.mergeCommitSha,
              message:
                params(ctx).message ??
                `Revert "${pr.title}"\n\nThis reverts pull request #${pr.number} (merge commit ${pr.mergeCommitSha}).`,
            },
            ctx.signal
          );
          ctx.set('revertBranch', branch);
          return `Created ${branch} reverting ${pr.mergeCommitSha.slice(0, 7)}`;
        },
      });
    },
  });

  const openPullRequest = defineStep({
    id: 'vcs.open-pull-request',
    kind: 'mutating',
    summary: 'Open a pull request from the revert branch, unless one is already open',
    params: z
      .object({
        title: z.string().min(1).optional(),
        body: z.string().optional(),
        draft: z.boolean().default(false),
        labels: z.array(z.string().min(1)).default([]),
      })
      .strict(),
    build: ({ name, description, params }) =>
      mutatingStep({
        name,
        description,
        requires: ['repository', 'pullRequest', 'revertBranch'],
        produces: ['revertPullRequest'],
        probe: async (ctx) => {
          const branch = String(ctx.get('revertBranch'));
          const existing = await services.vcs().findOpenPullRequest(readRepository(ctx), branch, ctx.signal);
          if (existing) {
            const { labels } = params(ctx);
            if (!ctx.dryRun && labels.length > 0) {
              await services.vcs().addLabels(readRepository(ctx), existing.number, labels, ctx.signal);
            }
            ctx.set('revertPullRequest', { number: existing.number, url: existing.url });
            return { applied: true, message: `Pull request #${existing.number} already open for ${branch}` };
          }
          return { applied: false };
        },
        preview: async (ctx) => {
          const pr = readPullRequest(ctx);
          const branch = String(ctx.get('revertBranch'));
          ctx.set('revertPullRequest', { number: 0, url: '(dry run)', planned: true });
          return `Dry run: would open a pull request from ${branch} into ${pr.baseBranch}`;
        },
        apply: async (ctx) => {
          const repository = readRepository(ctx);
          const pr = readPullRequest(ctx);
          const branch = String(ctx.get('revertBranch'));
          const { title, body, draft, labels } = params(ctx);

          const opened = await services.vcs().openPullRequest(
            {
              repository,
              head: branch,
              base: pr.baseBranch,
              title: title ?? `Revert "${pr.title}"`,
              body: body ?? `Reverts #${pr.number}.`,
              draft,
            },
            ctx.signal
          );
          ctx.set('revertPullRequest', { number: opened.number, url: opened.url });
          if (labels.length === 0) {
            return `Opened pull request #${opened.number}: ${opened.url}`;
          }
          await services.vcs().addLabels(repository, opened.number, labels, ctx.signal);
          return `Opened pull request #${opened.number}: ${opened.url} (labels: ${labels.join(', ')})`;
        },
      }),
  });

  return [inspectPullRequest, requireMerged, createRevertBranch, openPullRequest];
}
