/**
 * Pipeline Runner
 *
 * Executes a pipeline's steps strictly in declared order, one at a time:
 *
 * - cancellation is checked before each step, never mid-step
 * - preconditions are verified against the context before the action runs
 * - each attempt runs under a timeout; its writes are staged and merged only
 *   when it ends in success or skipped
 * - retryable steps are retried a bounded number of times with a fixed delay
 * - a fatal result halts the run; notify failures are always recoverable
 *
 * The runner performs no I/O besides logging. Persistence and progress
 * output hang off the observer hooks.
 *
 * @module @pipewright/engine/run/runner
 */

import { randomUUID } from 'node:crypto';
import {
  MissingPreconditionError,
  StepTimeoutError,
  createContext,
  errorCodeOf,
  getLogger,
  retryWithResult,
  runWithContext,
  withContext,
  type Logger,
  type PipewrightErrorCode,
} from '@pipewright/core';
import type { ContextKey, ContextValue, ExecutionContext } from '../context/execution-context.js';
import type { Pipeline } from '../pipeline/pipeline.js';
import type { Step, StepOutcome, StepResult, StepStatus } from '../step-contract/types.js';
import type { CancellationToken } from './cancellation.js';
import { remediationFor, type RunHalt, type RunReport } from './report.js';
import { StagedStepContext } from './step-context.js';

// =============================================================================
// Configuration
// =============================================================================

/** Default per-step timeout (300 s) */
export const DEFAULT_STEP_TIMEOUT_MS = 300_000;

/** Retries after the first attempt for retryable steps */
export const DEFAULT_RETRY_COUNT = 1;

/** Fixed delay between attempts */
export const DEFAULT_RETRY_DELAY_MS = 2_000;

/** How long a timed-out attempt may take to stop before the step fails */
export const DEFAULT_SETTLE_GRACE_MS = 10_000;

export interface PipelineRunnerOptions {
  stepTimeoutMs?: number;
  retryCount?: number;
  retryDelayMs?: number;
  /** Wait for a timed-out attempt to settle before retrying or returning */
  settleGraceMs?: number;
  logger?: Logger;
  /** Time source (tests) */
  clock?: () => Date;
  /** Run id generator (tests) */
  generateRunId?: () => string;
}

// =============================================================================
// Observers
// =============================================================================

export interface RunStartEvent {
  runId: string;
  pipeline: string;
  environment: string;
  dryRun: boolean;
  startedAt: string;
  stepCount: number;
}

export interface StepStartEvent {
  runId: string;
  stepName: string;
  kind: Step['kind'];
  /** 0-based position in the pipeline */
  index: number;
  total: number;
}

/**
 * Progress hooks. Errors thrown by observers are logged and otherwise ignored,
 * except for a `critical` observer, whose errors propagate out of `run()`.
 */
export interface RunObserver {
  readonly critical?: boolean;
  onRunStart?(event: RunStartEvent): void | Promise<void>;
  onStepStart?(event: StepStartEvent): void | Promise<void>;
  onStepComplete?(result: StepResult, event: StepStartEvent): void | Promise<void>;
  onRunComplete?(report: RunReport): void | Promise<void>;
}

export interface RunOptions {
  environment: string;
  runId?: string;
  /** Passed to every step; mutating steps preview instead of applying */
  dryRun?: boolean;
  cancellation?: CancellationToken;
  observers?: RunObserver[];
}

/**
 * Generate a run identifier
 */
export function generateRunId(): string {
  return `run-${randomUUID().replace(/-/g, '').slice(0, 12)}`;
}

interface RunScope {
  runId: string;
  pipeline: string;
  environment: string;
  dryRun: boolean;
}

type AttemptOutput = { outcome: StepOutcome; staged: Array<[ContextKey, ContextValue]> };

// =============================================================================
// Runner
// =============================================================================

export class PipelineRunner {
  private readonly stepTimeoutMs: number;
  private readonly retryCount: number;
  private readonly retryDelayMs: number;
  private readonly settleGraceMs: number;
  private readonly logger: Logger;
  private readonly clock: () => Date;
  private readonly generateRunId: () => string;

  constructor(options: PipelineRunnerOptions = {}) {
    this.stepTimeoutMs = options.stepTimeoutMs ?? DEFAULT_STEP_TIMEOUT_MS;
    this.retryCount = Math.max(0, options.retryCount ?? DEFAULT_RETRY_COUNT);
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    this.settleGraceMs = Math.max(0, options.settleGraceMs ?? DEFAULT_SETTLE_GRACE_MS);
    this.logger = options.logger ?? getLogger();
    this.clock = options.clock ?? (() => new Date());
    this.generateRunId = options.generateRunId ?? generateRunId;
  }

  /**
   * Run a pipeline to completion or halt
   */
  async run(pipeline: Pipeline, context: ExecutionContext, options: RunOptions): Promise<RunReport> {
    const scope: RunScope = {
      runId: options.runId ?? this.generateRunId(),
      pipeline: pipeline.name,
      environment: options.environment,
      dryRun: options.dryRun ?? false,
    };
    const telemetry = createContext({
      source: 'runner',
      runId: scope.runId,
      pipeline: scope.pipeline,
      environment: scope.environment,
    });

    return runWithContext(telemetry, () => this.execute(pipeline, context, scope, options));
  }

  private async execute(
    pipeline: Pipeline,
    context: ExecutionContext,
    scope: RunScope,
    options: RunOptions
  ): Promise<RunReport> {
    const observers = options.observers ?? [];
    const startedAt = this.clock();
    const results: StepResult[] = [];
    let halt: RunHalt | undefined;

    this.logger.info('Run started', { stepCount: pipeline.steps.length, dryRun: scope.dryRun });
    await this.emit(observers, 'onRunStart', (o) =>
      o.onRunStart?.({
        ...scope,
        startedAt: startedAt.toISOString(),
        stepCount: pipeline.steps.length,
      })
    );

    for (const [index, step] of pipeline.steps.entries()) {
      const cancelled = options.cancellation?.reason;
      if (cancelled) {
        halt = {
          stepName: step.name,
          reason: 'cancelled',
          errorCode: 'CANCELLED',
          message: `Run cancelled before step "${step.name}": ${cancelled.reason}`,
          remediation: remediationFor('CANCELLED', step.name),
        };
        this.logger.warn('Run cancelled', { nextStep: step.name, initiator: cancelled.initiator });
        break;
      }

      const event: StepStartEvent = {
        runId: scope.runId,
        stepName: step.name,
        kind: step.kind,
        index,
        total: pipeline.steps.length,
      };
      await this.emit(observers, 'onStepStart', (o) => o.onStepStart?.(event));

      const result = await withContext({ stepName: step.name }, () => this.executeStep(step, context, scope));
      results.push(result);

      await this.emit(observers, 'onStepComplete', (o) => o.onStepComplete?.(result, event));

      if (result.status === 'failed_fatal') {
        const errorCode = result.errorCode ?? 'INTERNAL_ERROR';
        halt = {
          stepName: step.name,
          reason: 'step_failed',
          errorCode,
          message: result.message,
          remediation: remediationFor(errorCode, step.name),
        };
        break;
      }
    }

    const completedAt = this.clock();
    const report: RunReport = {
      runId: scope.runId,
      pipeline: scope.pipeline,
      environment: scope.environment,
      status: halt ? 'halted_fatal' : 'completed',
      dryRun: scope.dryRun,
      startedAt: startedAt.toISOString(),
      completedAt: completedAt.toISOString(),
      durationMs: completedAt.getTime() - startedAt.getTime(),
      steps: results,
      context: context.snapshot(),
    };
    if (halt) {
      report.halt = Object.freeze(halt);
    }
    Object.freeze(results);
    Object.freeze(report);

    if (report.status === 'completed') {
      this.logger.info('Run completed', { durationMs: report.durationMs, stepCount: results.length });
    } else {
      this.logger.error('Run halted', undefined, { haltedAt: halt?.stepName, errorCode: halt?.errorCode });
    }

    await this.emit(observers, 'onRunComplete', (o) => o.onRunComplete?.(report));
    return report;
  }

  // ===========================================================================
  // Step Execution
  // ===========================================================================

  private async executeStep(step: Step, context: ExecutionContext, scope: RunScope): Promise<StepResult> {
    const startedAt = this.clock();

    const missing = step.requires.filter((key) => !context.has(key));
    if (missing.length > 0) {
      const message =
        missing.length === 1
          ? new MissingPreconditionError(missing[0], { stepName: step.name }).message
          : `Missing context keys ${missing.map((k) => `"${k}"`).join(', ')} required by step "${step.name}"`;
      return step.kind === 'notify'
        ? this.finish(step, startedAt, 'failed_recoverable', message, 0, 'NOTIFICATION_FAILURE')
        : this.finish(step, startedAt, 'failed_fatal', message, 0, 'MISSING_PRECONDITION');
    }

    const maxAttempts = step.kind === 'validation' || !step.retryable ? 1 : 1 + this.retryCount;
    const timeoutMs = step.timeoutMs ?? this.stepTimeoutMs;

    const attempted = await retryWithResult<AttemptOutput>(
      async (attempt) => {
        this.logger.stepStart(step.name, attempt, { kind: step.kind, maxAttempts });
        const controller = new AbortController();
        const stepCtx = new StagedStepContext(step, context, {
          ...scope,
          attempt,
          signal: controller.signal,
          logger: this.logger.child({ stepName: step.name, attempt }),
        });

        try {
          const outcome = await this.withTimeout(step, stepCtx, controller, timeoutMs);
          return { outcome, staged: stepCtx.staged() };
        } finally {
          stepCtx.seal();
        }
      },
      {
        maxAttempts,
        delayMs: this.retryDelayMs,
        onRetry: (attempt, error, delayMs) => {
          this.logger.warn('Step attempt failed, retrying', {
            stepName: step.name,
            attempt,
            maxAttempts,
            delayMs,
            errorCode: errorCodeOf(error),
            reason: messageOf(error),
          });
        },
      }
    );

    if (attempted.success) {
      context.merge(attempted.result.staged);
      const { outcome } = attempted.result;
      const message = outcome.message ?? (outcome.status === 'success' ? 'Succeeded' : 'Skipped');
      return this.finish(step, startedAt, outcome.status, message, attempted.attempts);
    }

    // Notify steps never halt a run, whatever the failure
    if (step.kind === 'notify') {
      return this.finish(
        step,
        startedAt,
        'failed_recoverable',
        messageOf(attempted.error),
        attempted.attempts,
        'NOTIFICATION_FAILURE'
      );
    }

    return this.finish(
      step,
      startedAt,
      'failed_fatal',
      messageOf(attempted.error),
      attempted.attempts,
      errorCodeOf(attempted.error)
    );
  }

  /**
   * Race the action against the step timeout. On timeout the signal fires
   * and the attempt gets `settleGraceMs` to stop. An attempt that is still
   * running after that fails the step without a retry, so no second attempt
   * ever runs beside it.
   */
  private async withTimeout(
    step: Step,
    stepCtx: StagedStepContext,
    controller: AbortController,
    timeoutMs: number
  ): Promise<StepOutcome> {
    const action = Promise.resolve().then(() => step.action(stepCtx));
    const winner = await raceTimer(action.then((outcome) => ({ outcome })), timeoutMs);
    if (winner !== undefined) {
      return winner.outcome;
    }

    const timedOut = new StepTimeoutError(step.name, timeoutMs);
    controller.abort(timedOut);

    const settled = await raceTimer(
      action.then(
        () => true,
        () => true
      ),
      this.settleGraceMs
    );
    if (settled === undefined) {
      this.logger.error('Timed-out attempt is still running', undefined, {
        stepName: step.name,
        timeoutMs,
        settleGraceMs: this.settleGraceMs,
      });
      throw new StepTimeoutError(step.name, timeoutMs, { stillRunningAfterMs: this.settleGraceMs });
    }
    throw timedOut;
  }

  private finish(
    step: Step,
    startedAt: Date,
    status: StepStatus,
    message: string,
    attempts: number,
    errorCode?: PipewrightErrorCode
  ): StepResult {
    const completedAt = this.clock();
    const result: StepResult = {
      stepName: step.name,
      kind: step.kind,
      status,
      message,
      elapsedMs: Math.max(0, completedAt.getTime() - startedAt.getTime()),
      attempts,
      startedAt: startedAt.toISOString(),
      completedAt: completedAt.toISOString(),
    };
    if (errorCode) {
      result.errorCode = errorCode;
    }
    Object.freeze(result);

    this.logger.stepEnd(step.name, status, result.elapsedMs, {
      kind: step.kind,
      attempts,
      ...(errorCode ? { errorCode, reason: message } : {}),
    });
    return result;
  }

  private async emit(
    observers: RunObserver[],
    hook: keyof RunObserver,
    call: (observer: RunObserver) => void | Promise<void>
  ): Promise<void> {
    for (const observer of observers) {
      try {
        await call(observer);
      } catch (error) {
        if (observer.critical) {
          this.logger.error('Critical run observer failed', error, { hook });
          throw error;
        }
        this.logger.warn('Run observer failed', { hook, reason: messageOf(error) });
      }
    }
  }
}

/**
 * Resolve with the promise's value, or undefined once `ms` elapse first
 */
async function raceTimer<T>(promise: Promise<T>, ms: number): Promise<T | undefined> {
  let timer: NodeJS.Timeout | undefined;
  const elapsed = new Promise<undefined>((resolve) => {
    timer = setTimeout(() => resolve(undefined), ms);
  });
  try {
    return await Promise.race([promise, elapsed]);
  } finally {
    clearTimeout(timer);
  }
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
