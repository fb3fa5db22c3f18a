/**
 * Pipeline Builder
 *
 * Resolves a parsed definition against a catalog and returns a validated
 * Pipeline. All problems are collected and reported together.
 *
 * @module @pipewright/engine/catalog/build
 */

import { PipelineDefinitionError } from '@pipewright/core';
import { createPipeline, type Pipeline } from '../pipeline/pipeline.js';
import type { PipelineDefinition, StepDefinition } from '../pipeline/definition.js';
import { placeholderKeys } from '../pipeline/template.js';
import type { Step } from '../step-contract/types.js';
import type { StepCatalog } from './catalog.js';

export interface BuildPipelineOptions {
  /** File the definition came from, for error messages */
  source?: string;
}

/**
 * Build an executable pipeline from a definition
 *
 * Placeholder keys in a step's params become preconditions of that step, so
 * validation checks them like any other requirement.
 *
 * @throws {PipelineDefinitionError} Listing every problem found
 */
export function buildPipeline(
  definition: PipelineDefinition,
  catalog: StepCatalog,
  options: BuildPipelineOptions = {}
): Pipeline {
  const problems: string[] = [];
  const steps: Step[] = [];

  for (const stepDef of definition.steps) {
    const factory = catalog.get(stepDef.uses);
    if (!factory) {
      const known = catalog.list().map((f) => f.id);
      problems.push(`Step "${stepDef.name}": unknown step type "${stepDef.uses}" (known: ${known.join(', ')})`);
      continue;
    }

    const placeholders = placeholderKeys(stepDef.with);
    if (placeholders.length === 0) {
      const issues = factory.check(stepDef.with);
      if (issues.length > 0) {
        problems.push(...issues.map((issue) => `Step "${stepDef.name}" (${stepDef.uses}): ${issue}`));
        continue;
      }
    }

    try {
      const step = factory.create({ name: stepDef.name, description: stepDef.description, with: stepDef.with });
      steps.push(applyOverrides(step, stepDef, placeholders));
    } catch (err) {
      if (!(err instanceof PipelineDefinitionError)) throw err;
      problems.push(...(err.problems.length > 0 ? err.problems : [err.message]).map((p) => `Step "${stepDef.name}": ${p}`));
    }
  }

  if (problems.length > 0) {
    throw new PipelineDefinitionError(`Invalid pipeline "${definition.name}"`, problems, { source: options.source });
  }

  return createPipeline(
    {
      name: definition.name,
      description: definition.description,
      inputs: definition.inputs,
      steps,
    },
    { source: options.source }
  );
}

function applyOverrides(step: Step, stepDef: StepDefinition, placeholders: string[]): Step {
  const requires = [...step.requires];
  for (const key of placeholders) {
    if (!requires.includes(key)) requires.push(key);
  }

  return Object.freeze({
    ...step,
    requires: Object.freeze(requires),
    retryable: stepDef.retryable ?? step.retryable,
    timeoutMs: stepDef.timeoutSeconds !== undefined ? stepDef.timeoutSeconds * 1000 : step.timeoutMs,
  });
}
