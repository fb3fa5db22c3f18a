/**
 * In-memory stand-ins for the external adapters used by catalog tests
 */

import { vi } from 'vitest';
import type {
  InfrastructurePlan,
  InfrastructureTool,
  InfrastructureValidation,
  OpenedPullRequest,
  OpenPullRequestRequest,
  OrchestrationPlane,
  PullRequestInfo,
  RepositoryRef,
  RevertBranchRequest,
  RolloutStatus,
  VersionControlHost,
} from '../../adapters/types.js';
import { formatRepositoryRef } from '../../adapters/types.js';
import type { Notification, NotificationSink } from '../../notifications/types.js';
import type { StepServices } from '../types.js';

export function mergedPullRequest(overrides: Partial<PullRequestInfo> = {}): PullRequestInfo {
  return {
    number: 42,
    title: 'Add caching layer',
    state: 'merged',
    merged: true,
    mergeCommitSha: 'abc1234def5678',
    baseBranch: 'main',
    headBranch: 'feature/cache',
    url: 'https://git.example.test/acme/web/pull/42',
    author: 'dev',
    ...overrides,
  };
}

export class FakeVersionControlHost implements VersionControlHost {
  readonly pullRequests = new Map<number, PullRequestInfo>();
  readonly branches = new Set<string>();
  readonly openPulls = new Map<string, OpenedPullRequest>();
  readonly revertRequests: RevertBranchRequest[] = [];
  readonly openRequests: OpenPullRequestRequest[] = [];
  readonly labelled: Array<{ number: number; labels: string[] }> = [];
  private nextNumber = 100;

  async getPullRequest(repository: RepositoryRef, number: number): Promise<PullRequestInfo> {
    const pr = this.pullRequests.get(number);
    if (!pr) {
      throw new Error(`${formatRepositoryRef(repository)}#${number} not found`);
    }
    return pr;
  }

  async branchExists(_repository: RepositoryRef, branch: string): Promise<boolean> {
    return this.branches.has(branch);
  }

  async createRevertBranch(request: RevertBranchRequest): Promise<void> {
    this.revertRequests.push(request);
    this.branches.add(request.branch);
  }

  async findOpenPullRequest(_repository: RepositoryRef, head: string): Promise<OpenedPullRequest | null> {
    return this.openPulls.get(head) ?? null;
  }

  async openPullRequest(request: OpenPullRequestRequest): Promise<OpenedPullRequest> {
    this.openRequests.push(request);
    const number = this.nextNumber++;
    const opened = { number, url: `https://git.example.test/${formatRepositoryRef(request.repository)}/pull/${number}` };
    this.openPulls.set(request.head, opened);
    return opened;
  }

  async addLabels(_repository: RepositoryRef, number: number, labels: string[]): Promise<void> {
    this.labelled.push({ number, labels });
  }
}

export class FakeOrchestrationPlane implements OrchestrationPlane {
  readonly applied: Array<{ paths: string[]; namespace: string; dryRun: boolean }> = [];
  readonly replicas = new Map<string, number>();
  rollout: RolloutStatus = { ready: true, message: 'successfully rolled out' };
  violations: string[] = [];

  async validateManifests(): Promise<string[]> {
    return this.violations;
  }

  async applyManifests(
    paths: string[],
    namespace: string,
    options: { dryRun?: boolean } = {}
  ): Promise<string[]> {
    this.applied.push({ paths, namespace, dryRun: options.dryRun ?? false });
    return paths.map((_, i) => `deployment.apps/web-${i} configured`);
  }

  async rolloutStatus(): Promise<RolloutStatus> {
    return this.rollout;
  }

  async getReplicas(resource: string, namespace: string): Promise<number> {
    return this.replicas.get(`${namespace}/${resource}`) ?? 1;
  }

  async scale(resource: string, namespace: string, replicas: number): Promise<void> {
    this.replicas.set(`${namespace}/${resource}`, replicas);
  }
}

export class FakeInfrastructureTool implements InfrastructureTool {
  plans: InfrastructurePlan[] = [];
  readonly applies: string[] = [];
  validation: InfrastructureValidation = { valid: true, diagnostics: [] };

  async validate(): Promise<InfrastructureValidation> {
    return this.validation;
  }

  async plan(): Promise<InfrastructurePlan> {
    return this.plans.shift() ?? { changes: 0, summary: 'No changes.' };
  }

  async apply(directory: string): Promise<{ summary: string }> {
    this.applies.push(directory);
    return { summary: 'Apply complete! Resources: 1 added, 0 changed, 0 destroyed.' };
  }
}

export class RecordingSink implements NotificationSink {
  readonly name = 'recording';
  readonly posted: Notification[] = [];

  async post(notification: Notification): Promise<void> {
    this.posted.push(notification);
  }
}

export interface FakeServices extends StepServices {
  host: FakeVersionControlHost;
  cluster: FakeOrchestrationPlane;
  infra: FakeInfrastructureTool;
  sink: RecordingSink;
}

export function fakeServices(workdir?: string): FakeServices {
  const host = new FakeVersionControlHost();
  const cluster = new FakeOrchestrationPlane();
  const infra = new FakeInfrastructureTool();
  const sink = new RecordingSink();
  return {
    host,
    cluster,
    infra,
    sink,
    vcs: vi.fn(() => host),
    orchestration: () => cluster,
    infrastructure: () => infra,
    notifications: sink,
    workdir,
  };
}
