/**
 * Status Command
 *
 * Shows a stored run report, or recent runs when no run id is given.
 */

import chalk from 'chalk';
import type { RunRecord, RunRecordStatus, RunReportStore } from '@pipewright/core';
import { RunRecorder, summarizeRunReport } from '@pipewright/engine';
import { loadCommandConfig, openRunStore, type CommandEnvironment } from '../services.js';

/**
 * Status command options
 */
export interface StatusOptions {
  runId?: string;
  pipeline?: string;
  environment?: string;
  limit?: number;
  json?: boolean;
}

export interface StatusCommandDeps extends CommandEnvironment {
  store?: RunReportStore;
}

const STATUS_ICONS: Record<RunRecordStatus, string> = {
  running: chalk.yellow('●'),
  completed: chalk.green('✓'),
  halted_fatal: chalk.red('✗'),
};

function recordJson(record: RunRecord) {
  return {
    runId: record.runId,
    pipeline: record.pipeline,
    environment: record.environment,
    status: record.status,
    dryRun: record.dryRun,
    startedAt: record.startedAt.toISOString(),
    updatedAt: record.updatedAt.toISOString(),
  };
}

/**
 * Execute the status command
 */
export async function statusCommand(options: StatusOptions, deps: StatusCommandDeps = {}): Promise<void> {
  const store = deps.store ?? openRunStore(loadCommandConfig(deps), deps);
  const recorder = new RunRecorder(store);

  try {
    if (options.runId) {
      await showRun(recorder, options.runId, options.json);
    } else {
      await listRuns(recorder, options);
    }
  } finally {
    if (!deps.store) {
      await store.close();
    }
  }
}

async function showRun(recorder: RunRecorder, runId: string, json?: boolean): Promise<void> {
  const { record, report } = await recorder.getRun(runId);

  if (json) {
    console.log(JSON.stringify(report ?? recordJson(record), null, 2));
    return;
  }

  if (!report) {
    console.log(`${STATUS_ICONS[record.status]} Run ${record.runId}: ${record.pipeline} → ${record.environment}`);
    console.log(chalk.dim(`  Still running (started ${record.startedAt.toISOString()})`));
    return;
  }

  const [header, ...rest] = summarizeRunReport(report);
  console.log(`${STATUS_ICONS[record.status]} ${chalk.bold(header)}`);
  for (const line of rest) {
    console.log(line);
  }
}

async function listRuns(recorder: RunRecorder, options: StatusOptions): Promise<void> {
  const runs = await recorder.listRuns({
    pipeline: options.pipeline,
    environment: options.environment,
    limit: options.limit,
  });

  if (options.json) {
    console.log(JSON.stringify(runs.map(recordJson), null, 2));
    return;
  }

  if (runs.length === 0) {
    console.log(chalk.dim('No runs recorded.'));
    return;
  }

  console.log(chalk.bold('Recent runs:'));
  for (const run of runs) {
    const mode = run.dryRun ? chalk.dim(' [dry run]') : '';
    console.log(
      `  ${STATUS_ICONS[run.status]} ${run.runId}  ${run.pipeline} → ${run.environment}${mode}  ${chalk.dim(run.startedAt.toISOString())}`
    );
  }
}
