/**
 * Run Recorder
 *
 * Persists runs through a RunReportStore: a `running` record when a run
 * starts, the final report when it ends. Attach it to a run as an observer;
 * it is critical, so a failed save fails the run instead of being logged.
 *
 * @module @pipewright/engine/run/recorder
 */

import {
  PipewrightError,
  RunNotFoundError,
  type RunFilter,
  type RunRecord,
  type RunReportStore,
} from '@pipewright/core';
import { parseRunReport, toRunReportJson, type RunReport } from './report.js';
import type { RunObserver, RunStartEvent } from './runner.js';

/**
 * A stored run with its parsed report (absent while still running)
 */
export interface RecordedRun {
  record: RunRecord;
  report?: RunReport;
}

export class RunRecorder implements RunObserver {
  constructor(
    private readonly store: RunReportStore,
    private readonly clock: () => Date = () => new Date()
  ) {}

  readonly critical = true;

  async onRunStart(event: RunStartEvent): Promise<void> {
    const startedAt = new Date(event.startedAt);
    await this.save({
      runId: event.runId,
      pipeline: event.pipeline,
      environment: event.environment,
      status: 'running',
      dryRun: event.dryRun,
      startedAt,
      updatedAt: startedAt,
    });
  }

  async onRunComplete(report: RunReport): Promise<void> {
    await this.save({
      runId: report.runId,
      pipeline: report.pipeline,
      environment: report.environment,
      status: report.status,
      dryRun: report.dryRun,
      startedAt: new Date(report.startedAt),
      updatedAt: this.clock(),
      report: toRunReportJson(report),
    });
  }

  /**
   * @throws {PipewrightError} INTERNAL_ERROR naming the run when the store fails
   */
  private async save(record: RunRecord): Promise<void> {
    try {
      await this.store.saveRun(record);
    } catch (error) {
      throw new PipewrightError(
        `Failed to save run ${record.runId} (${record.status}): ${error instanceof Error ? error.message : String(error)}`,
        {
          code: 'INTERNAL_ERROR',
          retryable: false,
          cause: error instanceof Error ? error : undefined,
          context: { runId: record.runId, status: record.status },
        }
      );
    }
  }

  /**
   * Load a run and its report
   *
   * @throws {RunNotFoundError}
   */
  async getRun(runId: string): Promise<RecordedRun> {
    const record = await this.store.getRun(runId);
    if (!record) {
      throw new RunNotFoundError(runId);
    }
    return {
      record,
      report: record.report === undefined ? undefined : parseRunReport(record.report),
    };
  }

  async listRuns(filter?: RunFilter): Promise<RunRecord[]> {
    return this.store.listRuns(filter);
  }

  /**
   * Another run of this pipeline in this environment still marked running
   */
  async findActiveRun(pipeline: string, environment: string): Promise<RunRecord | null> {
    return this.store.findActiveRun(pipeline, environment);
  }
}
