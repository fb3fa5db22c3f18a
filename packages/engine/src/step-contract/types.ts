/**
 * Step Contract Types
 *
 * A Step is one named unit of pipeline work with declared preconditions
 * (`requires`) and outputs (`produces`). Actions signal failure by throwing;
 * the runner classifies the error and records a StepResult.
 *
 * @module @pipewright/engine/step-contract
 */

import { z } from 'zod';
import { PIPEWRIGHT_ERROR_CODES, type Logger } from '@pipewright/core';
import type { ContextKey, ContextValue } from '../context/execution-context.js';

// =============================================================================
// Step Kinds
// =============================================================================

/**
 * - analyze: reads external state, writes facts to the context
 * - mutating: changes external state; must be idempotent
 * - validation: asserts an invariant about external state; never retried
 * - notify: posts a human-readable status; never halts a run
 */
export const StepKind = z.enum(['analyze', 'mutating', 'validation', 'notify']);
export type StepKind = z.infer<typeof StepKind>;

// =============================================================================
// Step Status
// =============================================================================

export const StepStatus = z.enum(['success', 'skipped', 'failed_recoverable', 'failed_fatal']);
export type StepStatus = z.infer<typeof StepStatus>;

/**
 * Whether a status lets the pipeline continue
 */
export const STATUS_CONTINUE_MAP: Record<StepStatus, boolean> = {
  success: true,
  skipped: true,
  failed_recoverable: true,
  failed_fatal: false,
};

export const ErrorCode = z.enum(PIPEWRIGHT_ERROR_CODES);

// =============================================================================
// Step Context
// =============================================================================

/**
 * What an action sees while it runs
 */
export interface StepContext {
  readonly runId: string;
  readonly pipeline: string;
  readonly environment: string;
  readonly stepName: string;
  /** 1-based attempt number */
  readonly attempt: number;
  readonly dryRun: boolean;
  /** Fires when the step times out */
  readonly signal: AbortSignal;
  readonly logger: Logger;

  /** @throws {MissingPreconditionError} If the key is absent */
  get(key: ContextKey): ContextValue;
  find(key: ContextKey): ContextValue | undefined;
  has(key: ContextKey): boolean;

  /**
   * Stage an output. Only keys in the step's `produces` are accepted;
   * staged writes reach the shared context only if the attempt succeeds.
   *
   * @throws {UndeclaredOutputError}
   */
  set(key: ContextKey, value: ContextValue): void;
}

// =============================================================================
// Step Definition
// =============================================================================

export interface StepOutcome {
  status: 'success' | 'skipped';
  message?: string;
}

export type StepAction = (ctx: StepContext) => Promise<StepOutcome>;

export interface Step {
  readonly name: string;
  readonly kind: StepKind;
  readonly description?: string;
  readonly requires: readonly ContextKey[];
  readonly produces: readonly ContextKey[];
  readonly retryable: boolean;
  /** Overrides the runner's default step timeout */
  readonly timeoutMs?: number;
  readonly action: StepAction;
}

// =============================================================================
// Step Result
// =============================================================================

export const StepResultSchema = z.object({
  stepName: z.string(),
  kind: StepKind,
  status: StepStatus,
  message: z.string(),
  elapsedMs: z.number().nonnegative(),
  /** Attempts made; 0 when the step never started */
  attempts: z.number().int().nonnegative(),
  startedAt: z.string().datetime(),
  completedAt: z.string().datetime(),
  /** Failure class, set for failed statuses */
  errorCode: ErrorCode.optional(),
});

export type StepResult = z.infer<typeof StepResultSchema>;
