/**
 * Step Factories
 *
 * One factory per step kind. Each wraps a small callback into a Step whose
 * action enforces the kind's semantics (idempotent mutation, dry run,
 * violations, notification delivery).
 *
 * @module @pipewright/engine/step-contract/factories
 */

import { ValidationFailureError } from '@pipewright/core';
import type { ContextKey } from '../context/execution-context.js';
import type { NotificationLevel, NotificationSink } from '../notifications/types.js';
import type { Step, StepContext, StepOutcome } from './types.js';

interface BaseStepOptions {
  name: string;
  description?: string;
  requires?: readonly ContextKey[];
  timeoutMs?: number;
}

function messageOr(message: string | void, fallback: string): string {
  return typeof message === 'string' && message.length > 0 ? message : fallback;
}

function freezeStep(step: Step): Step {
  return Object.freeze({
    ...step,
    requires: Object.freeze([...step.requires]),
    produces: Object.freeze([...step.produces]),
  });
}

// =============================================================================
// Analyze
// =============================================================================

export interface AnalyzeStepOptions extends BaseStepOptions {
  produces?: readonly ContextKey[];
  /** Default true: reads are safe to repeat */
  retryable?: boolean;
  /** Read external state and stage facts; may return a summary message */
  analyze: (ctx: StepContext) => Promise<string | void>;
}

/**
 * Reads external state and writes facts. Runs in dry run as well.
 */
export function analyzeStep(options: AnalyzeStepOptions): Step {
  return freezeStep({
    name: options.name,
    kind: 'analyze',
    description: options.description,
    requires: options.requires ?? [],
    produces: options.produces ?? [],
    retryable: options.retryable ?? true,
    timeoutMs: options.timeoutMs,
    action: async (ctx): Promise<StepOutcome> => {
      const message = await options.analyze(ctx);
      return { status: 'success', message: messageOr(message, 'Analyzed') };
    },
  });
}

// =============================================================================
// Mutating
// =============================================================================

export type ProbeResult = { applied: false } | { applied: true; message?: string };

export interface MutatingStepOptions extends BaseStepOptions {
  produces?: readonly ContextKey[];
  /** Default true: mutations are required to be idempotent */
  retryable?: boolean;
  /**
   * Look for the end state. When found, the step succeeds without calling
   * `apply`; the probe stages any outputs the existing state provides.
   */
  probe?: (ctx: StepContext) => Promise<ProbeResult>;
  /** Bring about the end state and stage outputs */
  apply: (ctx: StepContext) => Promise<string | void>;
  /** Dry run: stage planned outputs without touching external state */
  preview?: (ctx: StepContext) => Promise<string | void>;
}

/**
 * Changes external state, create-if-not-exists
 */
export function mutatingStep(options: MutatingStepOptions): Step {
  return freezeStep({
    name: options.name,
    kind: 'mutating',
    description: options.description,
    requires: options.requires ?? [],
    produces: options.produces ?? [],
    retryable: options.retryable ?? true,
    timeoutMs: options.timeoutMs,
    action: async (ctx): Promise<StepOutcome> => {
      if (options.probe) {
        const probed = await options.probe(ctx);
        if (probed.applied) {
          return { status: 'success', message: probed.message ?? 'Already applied' };
        }
      }

      if (ctx.dryRun) {
        const planned = options.preview ? await options.preview(ctx) : undefined;
        return { status: 'skipped', message: messageOr(planned, 'Dry run: not applied') };
      }

      const message = await options.apply(ctx);
      return { status: 'success', message: messageOr(message, 'Applied') };
    },
  });
}

// =============================================================================
// Validation
// =============================================================================

export interface ValidationStepOptions extends BaseStepOptions {
  /** Return violations; an empty list means the invariant holds */
  check: (ctx: StepContext) => Promise<string[]>;
  /** Skip in dry run (checks that only make sense after a real mutation) */
  skipInDryRun?: boolean;
}

/**
 * Asserts an invariant about external state. Never retried and produces nothing.
 */
export function validationStep(options: ValidationStepOptions): Step {
  return freezeStep({
    name: options.name,
    kind: 'validation',
    description: options.description,
    requires: options.requires ?? [],
    produces: [],
    retryable: false,
    timeoutMs: options.timeoutMs,
    action: async (ctx): Promise<StepOutcome> => {
      if (ctx.dryRun && options.skipInDryRun) {
        return { status: 'skipped', message: 'Dry run: check skipped' };
      }

      const violations = await options.check(ctx);
      if (violations.length > 0) {
        throw new ValidationFailureError(
          `${options.name}: ${violations.join('; ')}`,
          violations,
          { context: { stepName: options.name } }
        );
      }
      return { status: 'success', message: 'All checks passed' };
    },
  });
}

// =============================================================================
// Notify
// =============================================================================

export interface NotifyStepOptions extends BaseStepOptions {
  sink: NotificationSink;
  title: string | ((ctx: StepContext) => string);
  message: (ctx: StepContext) => string;
  level?: NotificationLevel | ((ctx: StepContext) => NotificationLevel);
  /** Default false */
  retryable?: boolean;
}

/**
 * Posts a status message. The runner records any failure as recoverable.
 */
export function notifyStep(options: NotifyStepOptions): Step {
  return freezeStep({
    name: options.name,
    kind: 'notify',
    description: options.description,
    requires: options.requires ?? [],
    produces: [],
    retryable: options.retryable ?? false,
    timeoutMs: options.timeoutMs,
    action: async (ctx): Promise<StepOutcome> => {
      if (ctx.dryRun) {
        return { status: 'skipped', message: `Dry run: not posted to ${options.sink.name}` };
      }

      await options.sink.post(
        {
          title: typeof options.title === 'string' ? options.title : options.title(ctx),
          text: options.message(ctx),
          level: typeof options.level === 'function' ? options.level(ctx) : (options.level ?? 'info'),
          runId: ctx.runId,
          pipeline: ctx.pipeline,
          environment: ctx.environment,
        },
        ctx.signal
      );
      return { status: 'success', message: `Posted to ${options.sink.name}` };
    },
  });
}
