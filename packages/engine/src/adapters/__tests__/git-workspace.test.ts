/**
 * Git Workspace Tests
 */

import { describe, it, expect } from 'vitest';
import { GitWorkspace } from '../git-workspace.js';
import { FakeCommandRunner } from './fake-runner.js';

const revert = {
  branch: 'revert-pr-42',
  baseBranch: 'main',
  commitSha: 'abc1234',
  message: 'Revert "Add caching layer"',
};

describe('GitWorkspace', () => {
  it('branches from the remote base, reverts and pushes', async () => {
    const runner = new FakeCommandRunner();
    const workspace = new GitWorkspace(runner, { workdir: '/srv/repo' });

    await workspace.revertOntoBranch(revert);

    expect(runner.calls.map((c) => c.args)).toEqual([
      ['fetch', 'origin', 'main'],
      ['checkout', '-B', 'revert-pr-42', 'origin/main'],
      ['revert', '--no-commit', '-m', '1', 'abc1234'],
      ['commit', '-m', 'Revert "Add caching layer"'],
      ['push', '--set-upstream', 'origin', 'revert-pr-42'],
    ]);
    expect(runner.calls.every((c) => c.command === 'git' && c.options.cwd === '/srv/repo')).toBe(true);
  });

  it('aborts a conflicting revert and fails without retry', async () => {
    const runner = new FakeCommandRunner().reply('git revert --no-commit', {
      exitCode: 1,
      stderr: 'CONFLICT (content): Merge conflict in app.ts\n',
    });
    const workspace = new GitWorkspace(runner, { workdir: '/srv/repo', remote: 'upstream' });

    await expect(workspace.revertOntoBranch(revert)).rejects.toMatchObject({
      message: 'Reverting abc1234 onto main failed: CONFLICT (content): Merge conflict in app.ts',
      code: 'EXTERNAL_CALL_FAILURE',
      retryable: false,
    });
    expect(runner.commandLines().slice(-2)).toEqual([
      'git revert --no-commit -m 1 abc1234',
      'git revert --abort',
    ]);
  });

  it('checks for a branch on the remote', async () => {
    const runner = new FakeCommandRunner().reply('git ls-remote --heads origin revert-pr-42', {
      stdout: 'abc1234\trefs/heads/revert-pr-42\n',
    });
    const workspace = new GitWorkspace(runner, { workdir: '/srv/repo' });

    await expect(workspace.remoteBranchExists('revert-pr-42')).resolves.toBe(true);
    await expect(workspace.remoteBranchExists('revert-pr-7')).resolves.toBe(false);
  });
});
