/**
 * Pipeline Validation
 *
 * Static checks run before any execution. A pipeline is sequential, so the
 * only dependency question is whether every precondition is available by the
 * time its step runs.
 *
 * @module @pipewright/engine/pipeline/validation
 */

import type { ContextKey } from '../context/execution-context.js';
import type { Step } from '../step-contract/types.js';

// =============================================================================
// Validation Result Types
// =============================================================================

/**
 * Error codes for pipeline validation
 */
export type PipelineErrorCode =
  | 'EMPTY_PIPELINE'
  | 'INVALID_NAME'
  | 'DUPLICATE_STEP_NAME'
  | 'UNSATISFIED_PRECONDITION'
  | 'RETRYABLE_VALIDATION'
  | 'INVALID_TIMEOUT';

export type PipelineWarningCode = 'UNUSED_OUTPUT' | 'UNUSED_INPUT';

export interface PipelineValidationIssue<C extends string> {
  code: C;
  message: string;
  stepName?: string;
  key?: ContextKey;
}

export type PipelineValidationError = PipelineValidationIssue<PipelineErrorCode>;
export type PipelineValidationWarning = PipelineValidationIssue<PipelineWarningCode>;

export interface PipelineValidationResult {
  valid: boolean;
  errors: PipelineValidationError[];
  warnings: PipelineValidationWarning[];
  /** Step names in execution order (if valid) */
  executionOrder?: string[];
}

/**
 * Shape validated; matches both a constructed Pipeline and its input spec
 */
export interface PipelineShape {
  name: string;
  inputs?: readonly ContextKey[];
  steps: readonly Step[];
}

const NAME_PATTERN = /^[a-z0-9][a-z0-9._-]*$/i;

// =============================================================================
// Validation
// =============================================================================

/**
 * Validate a pipeline
 *
 * @example
 * ```typescript
 * const result = validatePipeline({ name: 'deploy', inputs: ['image'], steps });
 * if (!result.valid) {
 *   for (const e of result.errors) console.error(e.message);
 * }
 * ```
 */
export function validatePipeline(pipeline: PipelineShape): PipelineValidationResult {
  const errors: PipelineValidationError[] = [];
  const warnings: PipelineValidationWarning[] = [];
  const inputs = pipeline.inputs ?? [];

  if (!NAME_PATTERN.test(pipeline.name)) {
    errors.push({
      code: 'INVALID_NAME',
      message: `Pipeline name "${pipeline.name}" must be alphanumeric with . _ or -`,
    });
  }

  if (pipeline.steps.length === 0) {
    errors.push({ code: 'EMPTY_PIPELINE', message: 'Pipeline has no steps' });
    return { valid: false, errors, warnings };
  }

  errors.push(...checkStepNames(pipeline.steps));
  errors.push(...checkPreconditions(inputs, pipeline.steps));
  errors.push(...checkStepSettings(pipeline.steps));
  warnings.push(...checkUnusedKeys(inputs, pipeline.steps));

  const valid = errors.length === 0;
  return {
    valid,
    errors,
    warnings,
    executionOrder: valid ? pipeline.steps.map((s) => s.name) : undefined,
  };
}

function checkStepNames(steps: readonly Step[]): PipelineValidationError[] {
  const errors: PipelineValidationError[] = [];
  const seen = new Set<string>();

  for (const step of steps) {
    if (!NAME_PATTERN.test(step.name)) {
      errors.push({
        code: 'INVALID_NAME',
        message: `Step name "${step.name}" must be alphanumeric with . _ or -`,
        stepName: step.name,
      });
    }
    if (seen.has(step.name)) {
      errors.push({
        code: 'DUPLICATE_STEP_NAME',
        message: `Duplicate step name "${step.name}"`,
        stepName: step.name,
      });
    }
    seen.add(step.name);
  }

  return errors;
}

function checkPreconditions(inputs: readonly ContextKey[], steps: readonly Step[]): PipelineValidationError[] {
  const errors: PipelineValidationError[] = [];
  const available = new Set<ContextKey>(inputs);

  steps.forEach((step, index) => {
    for (const key of step.requires) {
      if (available.has(key)) continue;

      const later = steps.slice(index).find((s) => s.produces.includes(key));
      const hint = later ? ` (produced by "${later.name}", which runs ${later === step ? 'as this step' : 'later'})` : '';
      errors.push({
        code: 'UNSATISFIED_PRECONDITION',
        message: `Step "${step.name}" requires "${key}", which is neither a pipeline input nor produced by an earlier step${hint}`,
        stepName: step.name,
        key,
      });
    }
    for (const key of step.produces) {
      available.add(key);
    }
  });

  return errors;
}

function checkStepSettings(steps: readonly Step[]): PipelineValidationError[] {
  const errors: PipelineValidationError[] = [];

  for (const step of steps) {
    if (step.kind === 'validation' && step.retryable) {
      errors.push({
        code: 'RETRYABLE_VALIDATION',
        message: `Validation step "${step.name}" cannot be retryable`,
        stepName: step.name,
      });
    }
    if (step.timeoutMs !== undefined && (!Number.isFinite(step.timeoutMs) || step.timeoutMs <= 0)) {
      errors.push({
        code: 'INVALID_TIMEOUT',
        message: `Step "${step.name}" has an invalid timeout (${step.timeoutMs}ms)`,
        stepName: step.name,
      });
    }
  }

  return errors;
}

function checkUnusedKeys(inputs: readonly ContextKey[], steps: readonly Step[]): PipelineValidationWarning[] {
  const warnings: PipelineValidationWarning[] = [];
  const required = new Set(steps.flatMap((s) => s.requires));

  for (const key of inputs) {
    if (!required.has(key)) {
      warnings.push({
        code: 'UNUSED_INPUT',
        message: `Input "${key}" is not required by any step`,
        key,
      });
    }
  }

  steps.forEach((step, index) => {
    const laterRequires = new Set(steps.slice(index + 1).flatMap((s) => s.requires));
    for (const key of step.produces) {
      if (!laterRequires.has(key)) {
        warnings.push({
          code: 'UNUSED_OUTPUT',
          message: `Output "${key}" of step "${step.name}" is not required by any later step`,
          stepName: step.name,
          key,
        });
      }
    }
  });

  return warnings;
}
