/**
 * SQLite Storage Implementation
 *
 * Default run-report backend. Uses better-sqlite3 for synchronous SQLite
 * access; the database is created on first use.
 */

import Database from 'better-sqlite3';
import { mkdirSync, existsSync } from 'node:fs';
import { dirname } from 'node:path';

import { expandPath } from '../config/loader.js';
import {
  DEFAULT_LIST_LIMIT,
  type RunFilter,
  type RunRecord,
  type RunRecordStatus,
  type RunReportStore,
} from './interfaces.js';

// =============================================================================
// Helpers
// =============================================================================

/**
 * Ensure directory exists
 */
function ensureDir(path: string): void {
  const dir = dirname(path);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
}

interface RunRow {
  run_id: string;
  pipeline: string;
  environment: string;
  status: string;
  dry_run: number;
  started_at: string;
  updated_at: string;
  report: string | null;
}

function toStatus(value: string): RunRecordStatus {
  switch (value) {
    case 'running':
    case 'completed':
    case 'halted_fatal':
      return value;
    default:
      throw new Error(`Unknown run status in store: ${value}`);
  }
}

function rowToRun(row: RunRow): RunRecord {
  const record: RunRecord = {
    runId: row.run_id,
    pipeline: row.pipeline,
    environment: row.environment,
    status: toStatus(row.status),
    dryRun: row.dry_run === 1,
    startedAt: new Date(row.started_at),
    updatedAt: new Date(row.updated_at),
  };
  if (row.report !== null) {
    record.report = JSON.parse(row.report);
  }
  return record;
}

// =============================================================================
// SQLite Run Report Store
// =============================================================================

export class SQLiteRunReportStore implements RunReportStore {
  private db: Database.Database;

  /**
   * @param dbPath - Database file, or `:memory:`
   */
  constructor(dbPath: string = '~/.pipewright/runs.db') {
    const expandedPath = dbPath === ':memory:' ? dbPath : expandPath(dbPath);
    if (expandedPath !== ':memory:') {
      ensureDir(expandedPath);
    }

    this.db = new Database(expandedPath);
    this.db.pragma('journal_mode = WAL');
    this.migrate();
  }

  async saveRun(record: RunRecord): Promise<void> {
    const stmt = this.db.prepare(`
      INSERT OR REPLACE INTO runs (
        run_id, pipeline, environment, status, dry_run, started_at, updated_at, report
      ) VALUES (
        @runId, @pipeline, @environment, @status, @dryRun, @startedAt, @updatedAt, @report
      )
    `);

    stmt.run({
      runId: record.runId,
      pipeline: record.pipeline,
      environment: record.environment,
      status: record.status,
      dryRun: record.dryRun ? 1 : 0,
      startedAt: record.startedAt.toISOString(),
      updatedAt: record.updatedAt.toISOString(),
      report: record.report === undefined ? null : JSON.stringify(record.report),
    });
  }

  async getRun(runId: string): Promise<RunRecord | null> {
    const stmt = this.db.prepare<[string], RunRow>('SELECT * FROM runs WHERE run_id = ?');
    const row = stmt.get(runId);
    return row ? rowToRun(row) : null;
  }

  async listRuns(filter?: RunFilter): Promise<RunRecord[]> {
    let sql = 'SELECT * FROM runs WHERE 1=1';
    const params: Array<string | number> = [];

    if (filter?.pipeline) {
      sql += ' AND pipeline = ?';
      params.push(filter.pipeline);
    }
    if (filter?.environment) {
      sql += ' AND environment = ?';
      params.push(filter.environment);
    }
    if (filter?.status) {
      sql += ' AND status = ?';
      params.push(filter.status);
    }

    sql += ' ORDER BY started_at DESC, rowid DESC LIMIT ?';
    params.push(filter?.limit ?? DEFAULT_LIST_LIMIT);

    const stmt = this.db.prepare<Array<string | number>, RunRow>(sql);
    return stmt.all(...params).map(rowToRun);
  }

  async findActiveRun(pipeline: string, environment: string): Promise<RunRecord | null> {
    const [active] = await this.listRuns({ pipeline, environment, status: 'running', limit: 1 });
    return active ?? null;
  }

  async close(): Promise<void> {
    this.db.close();
  }

  private migrate(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS runs (
        run_id TEXT PRIMARY KEY,
        pipeline TEXT NOT NULL,
        environment TEXT NOT NULL,
        status TEXT NOT NULL,
        dry_run INTEGER NOT NULL DEFAULT 0,
        started_at TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        report TEXT
      );

      CREATE INDEX IF NOT EXISTS idx_runs_pipeline_env ON runs(pipeline, environment, status);
      CREATE INDEX IF NOT EXISTS idx_runs_started ON runs(started_at);
    `);
  }
}
