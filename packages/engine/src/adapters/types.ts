/**
 * External Adapter Interfaces
 *
 * The few calls the built-in steps make against a version-control host, a
 * container orchestration control plane and an infrastructure-as-code tool.
 * Production implementations shell out or call HTTP APIs; tests use
 * in-memory fakes.
 *
 * Implementations throw ExternalCallError for transient failures so the
 * runner can retry them.
 *
 * @module @pipewright/engine/adapters/types
 */

// =============================================================================
// Version Control
// =============================================================================

/**
 * `owner/name` repository reference
 */
export interface RepositoryRef {
  owner: string;
  name: string;
}

export type PullRequestState = 'open' | 'closed' | 'merged';

export interface PullRequestInfo {
  number: number;
  title: string;
  state: PullRequestState;
  merged: boolean;
  /** Commit created by the merge; null until merged */
  mergeCommitSha: string | null;
  baseBranch: string;
  headBranch: string;
  url: string;
  author: string;
}

export interface OpenedPullRequest {
  number: number;
  url: string;
}

export interface RevertBranchRequest {
  repository: RepositoryRef;
  branch: string;
  baseBranch: string;
  /** Merge commit to revert (mainline parent 1) */
  commitSha: string;
  message: string;
}

export interface OpenPullRequestRequest {
  repository: RepositoryRef;
  head: string;
  base: string;
  title: string;
  body: string;
  draft?: boolean;
}

export interface VersionControlHost {
  getPullRequest(repository: RepositoryRef, number: number, signal?: AbortSignal): Promise<PullRequestInfo>;
  branchExists(repository: RepositoryRef, branch: string, signal?: AbortSignal): Promise<boolean>;
  /** Create a branch from base containing a revert of the commit, and publish it */
  createRevertBranch(request: RevertBranchRequest, signal?: AbortSignal): Promise<void>;
  /** Open pull request whose head is the given branch, if any */
  findOpenPullRequest(repository: RepositoryRef, head: string, signal?: AbortSignal): Promise<OpenedPullRequest | null>;
  openPullRequest(request: OpenPullRequestRequest, signal?: AbortSignal): Promise<OpenedPullRequest>;
  /** Add labels to a pull request; labels it already has are kept */
  addLabels(repository: RepositoryRef, number: number, labels: string[], signal?: AbortSignal): Promise<void>;
}

/**
 * Parse `owner/name`
 *
 * @returns null if the value is not of that shape
 */
export function parseRepositoryRef(value: string): RepositoryRef | null {
  const match = value.trim().match(/^([A-Za-z0-9_.-]+)\/([A-Za-z0-9_.-]+)$/);
  if (!match) return null;
  return { owner: match[1], name: match[2] };
}

export function formatRepositoryRef(ref: RepositoryRef): string {
  return `${ref.owner}/${ref.name}`;
}

// =============================================================================
// Orchestration
// =============================================================================

export interface ApplyManifestsOptions {
  /** Server-side dry run: validate against the cluster without persisting */
  dryRun?: boolean;
  signal?: AbortSignal;
}

export interface RolloutStatus {
  ready: boolean;
  message: string;
}

export interface OrchestrationPlane {
  /** Client-side validation; returns violations */
  validateManifests(paths: string[], signal?: AbortSignal): Promise<string[]>;
  /** Apply manifests; returns one line per affected resource */
  applyManifests(paths: string[], namespace: string, options?: ApplyManifestsOptions): Promise<string[]>;
  /** Wait for a rollout to finish, up to the timeout */
  rolloutStatus(resource: string, namespace: string, timeoutSeconds: number, signal?: AbortSignal): Promise<RolloutStatus>;
  getReplicas(resource: string, namespace: string, signal?: AbortSignal): Promise<number>;
  scale(resource: string, namespace: string, replicas: number, signal?: AbortSignal): Promise<void>;
}

// =============================================================================
// Infrastructure as Code
// =============================================================================

export interface InfrastructureValidation {
  valid: boolean;
  diagnostics: string[];
}

export interface InfrastructurePlan {
  /** Resources that would be added, changed or destroyed; null if unreadable */
  changes: number | null;
  summary: string;
}

export interface InfrastructureTool {
  validate(directory: string, signal?: AbortSignal): Promise<InfrastructureValidation>;
  plan(directory: string, variables: Record<string, string>, signal?: AbortSignal): Promise<InfrastructurePlan>;
  apply(directory: string, variables: Record<string, string>, signal?: AbortSignal): Promise<{ summary: string }>;
}
