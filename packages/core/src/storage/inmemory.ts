/**
 * In-Memory Storage Implementation
 *
 * For tests and `PIPEWRIGHT_STORAGE=memory`. Records live for the life of the process.
 */

import {
  DEFAULT_LIST_LIMIT,
  type RunFilter,
  type RunRecord,
  type RunReportStore,
} from './interfaces.js';

function clone(record: RunRecord): RunRecord {
  return {
    ...record,
    startedAt: new Date(record.startedAt),
    updatedAt: new Date(record.updatedAt),
    report: record.report === undefined ? undefined : structuredClone(record.report),
  };
}

export class InMemoryRunReportStore implements RunReportStore {
  private runs = new Map<string, RunRecord>();
  private order: string[] = [];

  async saveRun(record: RunRecord): Promise<void> {
    if (!this.runs.has(record.runId)) {
      this.order.push(record.runId);
    }
    this.runs.set(record.runId, clone(record));
  }

  async getRun(runId: string): Promise<RunRecord | null> {
    const record = this.runs.get(runId);
    return record ? clone(record) : null;
  }

  async listRuns(filter?: RunFilter): Promise<RunRecord[]> {
    const results: RunRecord[] = [];
    // Newest first; insertion order breaks ties on startedAt
    const ids = [...this.order].reverse();
    const records = ids
      .map((id) => this.runs.get(id))
      .filter((r): r is RunRecord => r !== undefined)
      .sort((a, b) => b.startedAt.getTime() - a.startedAt.getTime());

    for (const record of records) {
      if (filter?.pipeline && record.pipeline !== filter.pipeline) continue;
      if (filter?.environment && record.environment !== filter.environment) continue;
      if (filter?.status && record.status !== filter.status) continue;
      results.push(clone(record));
      if (results.length >= (filter?.limit ?? DEFAULT_LIST_LIMIT)) break;
    }

    return results;
  }

  async findActiveRun(pipeline: string, environment: string): Promise<RunRecord | null> {
    const [active] = await this.listRuns({ pipeline, environment, status: 'running', limit: 1 });
    return active ?? null;
  }

  async close(): Promise<void> {
    this.runs.clear();
    this.order = [];
  }
}
