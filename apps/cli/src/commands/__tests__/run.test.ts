/**
 * Tests for pipewright run
 */

import { EventEmitter } from 'node:events';
import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { InMemoryRunReportStore, toExitCode, type RunRecord } from '@pipewright/core';
import { parseSetPairs, runCommand, runExitCode, type RunCommandDeps } from '../run.js';
import {
  RELEASE_PIPELINE,
  RecordingSink,
  createTestProject,
  fileOnlyServices,
  silentLogger,
  type TestProject,
} from './project.js';

describe('Run Command', () => {
  let project: TestProject;
  let store: InMemoryRunReportStore;
  let sink: RecordingSink;
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;

  function deps(overrides: Partial<RunCommandDeps> = {}): RunCommandDeps {
    return {
      ...project.env,
      services: fileOnlyServices(project.dir, sink),
      store,
      logger: silentLogger,
      signals: new EventEmitter(),
      exit: vi.fn(),
      ...overrides,
    };
  }

  beforeEach(() => {
    project = createTestProject();
    project.writePipeline('release.yaml', RELEASE_PIPELINE);
    project.writeConfig({
      runner: { retryDelayMs: 0 },
      environments: { staging: { context: { region: 'eu-west-1' } } },
    });
    store = new InMemoryRunReportStore();
    sink = new RecordingSink();
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    project.cleanup();
  });

  // ===========================================================================
  // Successful Runs
  // ===========================================================================

  it('runs every step and seeds the context from config and --set', async () => {
    const report = await runCommand(
      { pipeline: 'release', environment: 'staging', set: ['image=web:1.4.0'] },
      deps()
    );

    expect(report.status).toBe('completed');
    expect(runExitCode(report)).toBe(0);
    expect(report.steps.map((s) => [s.stepName, s.status, s.message])).toEqual([
      ['write-config', 'success', 'Wrote out/staging.env (33 bytes)'],
      ['check-config', 'success', 'All checks passed'],
      ['announce', 'success', 'Posted to recording'],
    ]);
    expect(readFileSync(join(project.dir, 'out', 'staging.env'), 'utf-8')).toBe(
      'IMAGE=web:1.4.0\nREGION=eu-west-1\n'
    );
    expect(sink.posted).toEqual([
      {
        title: 'release → staging',
        text: 'Released web:1.4.0 to staging',
        level: 'info',
        runId: report.runId,
        pipeline: 'release',
        environment: 'staging',
      },
    ]);
  });

  it('records the run in the store', async () => {
    const report = await runCommand(
      { pipeline: 'release', environment: 'staging', set: ['image=web:1.4.0'] },
      deps()
    );

    const record = await store.getRun(report.runId);
    expect(record).toMatchObject({ pipeline: 'release', environment: 'staging', status: 'completed' });
  });

  it('prints each step outcome as it completes', async () => {
    await runCommand({ pipeline: 'release', environment: 'staging', set: ['image=web:1.4.0'] }, deps());

    expect(consoleLogSpy).toHaveBeenCalledWith(expect.stringContaining('write-config'));
    expect(consoleLogSpy).toHaveBeenCalledWith(expect.stringContaining('Wrote out/staging.env (33 bytes)'));
    expect(consoleLogSpy).toHaveBeenCalledWith(expect.stringContaining('Completed 3 steps in'));
  });

  it('prints only the JSON report with --json', async () => {
    const report = await runCommand(
      { pipeline: 'release', environment: 'staging', set: ['image=web:1.4.0'], json: true },
      deps()
    );

    expect(consoleLogSpy).toHaveBeenCalledTimes(1);
    const printed = JSON.parse(String(consoleLogSpy.mock.calls[0][0]));
    expect(printed).toMatchObject({ runId: report.runId, status: 'completed', pipeline: 'release' });
    expect(printed.context).toMatchObject({ environment: 'staging', image: 'web:1.4.0', region: 'eu-west-1' });
  });

  it('lets --set override configured environment values', async () => {
    const report = await runCommand(
      { pipeline: 'release', environment: 'staging', set: ['image=web:1.4.0', 'region=us-east-1'] },
      deps()
    );

    expect(report.context.region).toBe('us-east-1');
  });

  it('previews instead of writing in a dry run', async () => {
    const report = await runCommand(
      { pipeline: 'release', environment: 'staging', set: ['image=web:1.4.0'], dryRun: true },
      deps()
    );

    expect(report.status).toBe('completed');
    expect(report.dryRun).toBe(true);
    expect(report.steps.map((s) => [s.status, s.message])).toEqual([
      ['skipped', 'Dry run: would write out/staging.env (33 bytes)'],
      ['skipped', 'Dry run: check skipped'],
      ['skipped', 'Dry run: not posted to recording'],
    ]);
    expect(existsSync(join(project.dir, 'out', 'staging.env'))).toBe(false);
    expect(sink.posted).toEqual([]);
  });

  // ===========================================================================
  // Failures
  // ===========================================================================

  it('rejects a run with an unseeded input before any step starts', async () => {
    await expect(runCommand({ pipeline: 'release', environment: 'staging' }, deps())).rejects.toMatchObject({
      code: 'MISSING_PRECONDITION',
      message: 'Missing context key "image"',
    });
    expect(await store.listRuns()).toEqual([]);
  });

  it('rejects an unknown pipeline with the available names', async () => {
    await expect(
      runCommand({ pipeline: 'rollback', environment: 'staging' }, deps())
    ).rejects.toMatchObject({ code: 'DEFINITION_ERROR' });
    await expect(runCommand({ pipeline: 'rollback', environment: 'staging' }, deps())).rejects.toThrow(
      /^Pipeline "rollback" not found in .* \(available: release\)$/
    );
  });

  it('halts on a failed validation step and maps it to an exit code', async () => {
    project.writePipeline(
      'release.yaml',
      RELEASE_PIPELINE.replace('keys: [IMAGE, REGION]', 'keys: [IMAGE, REGION, REPLICAS]')
    );

    const report = await runCommand(
      { pipeline: 'release', environment: 'staging', set: ['image=web:1.4.0'] },
      deps()
    );

    expect(report.status).toBe('halted_fatal');
    expect(report.halt).toMatchObject({
      stepName: 'check-config',
      errorCode: 'VALIDATION_FAILURE',
      message: 'check-config: REPLICAS is missing from out/staging.env',
    });
    expect(report.steps).toHaveLength(2);
    expect(sink.posted).toEqual([]);
    expect(runExitCode(report)).toBe(20);
  });

  it('refuses to start while another run is recorded as running', async () => {
    const startedAt = new Date('2026-03-01T10:00:00.000Z');
    await store.saveRun({
      runId: 'run-active',
      pipeline: 'release',
      environment: 'staging',
      status: 'running',
      dryRun: false,
      startedAt,
      updatedAt: startedAt,
    });

    await expect(
      runCommand({ pipeline: 'release', environment: 'staging', set: ['image=web:1.4.0'] }, deps())
    ).rejects.toMatchObject({ code: 'RUN_IN_PROGRESS', activeRunId: 'run-active' });

    const forced = await runCommand(
      { pipeline: 'release', environment: 'staging', set: ['image=web:1.4.0'], force: true },
      deps()
    );
    expect(forced.status).toBe('completed');
  });

  it('fails when the final report cannot be saved', async () => {
    class FinalSaveFailingStore extends InMemoryRunReportStore {
      async saveRun(record: RunRecord): Promise<void> {
        if (record.status !== 'running') {
          throw new Error('disk full');
        }
        await super.saveRun(record);
      }
    }
    store = new FinalSaveFailingStore();

    const error = await runCommand(
      { pipeline: 'release', environment: 'staging', set: ['image=web:1.4.0'] },
      deps()
    ).catch((err: unknown) => err);

    expect(error).toMatchObject({ code: 'INTERNAL_ERROR' });
    expect(String(error)).toMatch(/Failed to save run run-\w+ \(completed\): disk full$/);
    expect(toExitCode(error)).toBe(40);
    expect(consoleLogSpy).not.toHaveBeenCalledWith(expect.stringContaining('Run ID'));
  });

  // ===========================================================================
  // Interrupts
  // ===========================================================================

  it('cancels before the next step on the first SIGINT and exits on the second', async () => {
    const signals = new EventEmitter();
    const exit = vi.fn();
    sink = new RecordingSink(() => {
      signals.emit('SIGINT');
    });
    project.writePipeline(
      'notify-first.yaml',
      `
name: notify-first
inputs: [environment]
steps:
  - name: announce
    uses: notify.post
    with: { message: "Starting \${environment}" }
  - name: write-marker
    uses: files.write
    with: { path: marker.txt, content: "done" }
`
    );

    const report = await runCommand({ pipeline: 'notify-first', environment: 'staging' }, deps({ signals, exit }));

    expect(report.status).toBe('halted_fatal');
    expect(report.halt).toMatchObject({
      stepName: 'write-marker',
      reason: 'cancelled',
      errorCode: 'CANCELLED',
      message: 'Run cancelled before step "write-marker": interrupted (SIGINT)',
    });
    expect(runExitCode(report)).toBe(130);
    expect(existsSync(join(project.dir, 'marker.txt'))).toBe(false);
    expect(exit).not.toHaveBeenCalled();

    signals.emit('SIGINT');
    expect(signals.listenerCount('SIGINT')).toBe(0);
  });

  it('exits with 130 on a second SIGINT during a run', async () => {
    const signals = new EventEmitter();
    const exit = vi.fn();
    sink = new RecordingSink(() => {
      signals.emit('SIGINT');
      signals.emit('SIGINT');
    });

    await runCommand(
      { pipeline: 'release', environment: 'staging', set: ['image=web:1.4.0'] },
      deps({ signals, exit })
    );

    expect(exit).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledWith(130);
  });
});

describe('parseSetPairs', () => {
  it('keeps numbers and booleans typed', () => {
    expect(parseSetPairs(['replicas=3', 'canary=true', 'tag=v1=rc', 'note='])).toEqual({
      replicas: 3,
      canary: true,
      tag: 'v1=rc',
      note: '',
    });
  });

  it('rejects pairs without a key', () => {
    expect(() => parseSetPairs(['image'])).toThrow('Invalid --set value "image". Use key=value.');
    expect(() => parseSetPairs(['=web'])).toThrow('Invalid --set value "=web". Use key=value.');
  });
});
