/**
 * Pipeline
 *
 * @module @pipewright/engine/pipeline/pipeline
 */

import { PipelineDefinitionError } from '@pipewright/core';
import type { ContextKey } from '../context/execution-context.js';
import type { Step } from '../step-contract/types.js';
import { validatePipeline, type PipelineValidationWarning } from './validation.js';

/**
 * An ordered, validated list of steps. Frozen after construction.
 */
export interface Pipeline {
  readonly name: string;
  readonly description?: string;
  /** Keys the caller must seed into the context */
  readonly inputs: readonly ContextKey[];
  readonly steps: readonly Step[];
  /** Non-fatal findings from validation */
  readonly warnings: readonly PipelineValidationWarning[];
}

export interface PipelineSpec {
  name: string;
  description?: string;
  inputs?: ContextKey[];
  steps: Step[];
}

/**
 * Validate and freeze a pipeline
 *
 * @throws {PipelineDefinitionError} Listing every violation
 */
export function createPipeline(spec: PipelineSpec, options: { source?: string } = {}): Pipeline {
  const result = validatePipeline(spec);
  if (!result.valid) {
    throw new PipelineDefinitionError(
      `Invalid pipeline "${spec.name}"`,
      result.errors.map((e) => e.message),
      { source: options.source }
    );
  }

  return Object.freeze({
    name: spec.name,
    description: spec.description,
    inputs: Object.freeze([...(spec.inputs ?? [])]),
    steps: Object.freeze([...spec.steps]),
    warnings: Object.freeze(result.warnings),
  });
}
