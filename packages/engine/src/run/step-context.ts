/**
 * Staged Step Context
 *
 * The StepContext handed to one attempt of one step. Reads see the shared
 * context plus this attempt's own writes; writes are held back until the
 * runner decides the attempt succeeded.
 *
 * @module @pipewright/engine/run/step-context
 */

import { PipewrightError, UndeclaredOutputError, MissingPreconditionError, type Logger } from '@pipewright/core';
import type { ContextKey, ContextValue, ExecutionContext } from '../context/execution-context.js';
import type { Step, StepContext } from '../step-contract/types.js';

export interface StagedStepContextOptions {
  runId: string;
  pipeline: string;
  environment: string;
  attempt: number;
  dryRun: boolean;
  signal: AbortSignal;
  logger: Logger;
}

export class StagedStepContext implements StepContext {
  readonly runId: string;
  readonly pipeline: string;
  readonly environment: string;
  readonly stepName: string;
  readonly attempt: number;
  readonly dryRun: boolean;
  readonly signal: AbortSignal;
  readonly logger: Logger;

  private readonly writes = new Map<ContextKey, ContextValue>();
  private sealed = false;

  constructor(
    private readonly step: Step,
    private readonly context: ExecutionContext,
    options: StagedStepContextOptions
  ) {
    this.runId = options.runId;
    this.pipeline = options.pipeline;
    this.environment = options.environment;
    this.stepName = step.name;
    this.attempt = options.attempt;
    this.dryRun = options.dryRun;
    this.signal = options.signal;
    this.logger = options.logger;
  }

  get(key: ContextKey): ContextValue {
    const value = this.find(key);
    if (value === undefined) {
      throw new MissingPreconditionError(key, { stepName: this.step.name });
    }
    return value;
  }

  find(key: ContextKey): ContextValue | undefined {
    return this.writes.has(key) ? this.writes.get(key) : this.context.find(key);
  }

  has(key: ContextKey): boolean {
    return this.writes.has(key) || this.context.has(key);
  }

  set(key: ContextKey, value: ContextValue): void {
    if (this.sealed) {
      // An abandoned (timed-out) attempt still running in the background
      throw new PipewrightError(`Step "${this.step.name}" attempt ${this.attempt} has already ended`, {
        code: 'INTERNAL_ERROR',
        retryable: false,
        context: { stepName: this.step.name, key },
      });
    }
    if (!this.step.produces.includes(key)) {
      throw new UndeclaredOutputError(this.step.name, key, this.step.produces);
    }
    this.writes.set(key, structuredClone(value));
  }

  /**
   * Stop accepting writes
   */
  seal(): void {
    this.sealed = true;
  }

  /**
   * Writes made during this attempt
   */
  staged(): Array<[ContextKey, ContextValue]> {
    return [...this.writes.entries()];
  }
}
