/**
 * Storage Interfaces
 *
 * Run records persisted between CLI invocations so that `status` can look a
 * run up after `run` has exited. The report payload is kept opaque here; the
 * engine owns its schema and parses it on the way out.
 *
 * @module @pipewright/core/storage/interfaces
 */

// =============================================================================
// Run Records
// =============================================================================

/**
 * Lifecycle of a stored run
 *
 * `running` is written when a run starts; the final status replaces it.
 */
export type RunRecordStatus = 'running' | 'completed' | 'halted_fatal';

/**
 * A stored pipeline run
 */
export interface RunRecord {
  runId: string;
  pipeline: string;
  environment: string;
  status: RunRecordStatus;
  dryRun: boolean;
  startedAt: Date;
  updatedAt: Date;
  /** Serialized run report, present once the run has finished */
  report?: unknown;
}

/**
 * Filter options for listing runs
 */
export interface RunFilter {
  pipeline?: string;
  environment?: string;
  status?: RunRecordStatus;
  /** Maximum records returned, newest first (default 20) */
  limit?: number;
}

// =============================================================================
// Store Interface
// =============================================================================

/**
 * Run report store
 */
export interface RunReportStore {
  /** Insert or replace a run record */
  saveRun(record: RunRecord): Promise<void>;

  /** Get a run by id, or null */
  getRun(runId: string): Promise<RunRecord | null>;

  /** List runs, newest first */
  listRuns(filter?: RunFilter): Promise<RunRecord[]>;

  /** Most recent run of a pipeline in an environment still marked running */
  findActiveRun(pipeline: string, environment: string): Promise<RunRecord | null>;

  /** Release resources */
  close(): Promise<void>;
}

export const DEFAULT_LIST_LIMIT = 20;
