/**
 * Step Catalog Types
 *
 * A catalog maps ids used in pipeline definitions (`uses: k8s.apply`) to
 * factories that build Steps from a name and params.
 *
 * @module @pipewright/engine/catalog/types
 */

import type { z } from 'zod';
import { PipelineDefinitionError } from '@pipewright/core';
import type { ContextReader, ContextRecord } from '../context/execution-context.js';
import type { InfrastructureTool, OrchestrationPlane, VersionControlHost } from '../adapters/types.js';
import type { NotificationSink } from '../notifications/types.js';
import { hasPlaceholders, renderValue } from '../pipeline/template.js';
import type { Step, StepKind } from '../step-contract/types.js';

// =============================================================================
// Services
// =============================================================================

/**
 * Collaborators the built-in steps call. Adapters are resolved lazily so a
 * pipeline that never touches GitHub needs no token.
 */
export interface StepServices {
  vcs(): VersionControlHost;
  orchestration(): OrchestrationPlane;
  infrastructure(): InfrastructureTool;
  notifications: NotificationSink;
  /** Base directory for relative file paths (default: process.cwd()) */
  workdir?: string;
}

// =============================================================================
// Factories
// =============================================================================

export interface StepCreateInput {
  name: string;
  description?: string;
  /** Params as written in the definition */
  with: ContextRecord;
}

export interface StepFactory {
  readonly id: string;
  readonly kind: StepKind;
  readonly summary: string;
  /** Problems with params that contain no placeholders */
  check(params: ContextRecord): string[];
  /** @throws {PipelineDefinitionError} */
  create(input: StepCreateInput): Step;
}

/**
 * What a factory definition receives when building a step
 */
export interface StepBuildInput<P> {
  name: string;
  description?: string;
  raw: ContextRecord;
  /** Parsed params when they contain no placeholders */
  staticParams?: P;
  /**
   * Render placeholders against the step's context and parse
   *
   * @throws {MissingPreconditionError} For a placeholder whose key is absent
   * @throws {PipelineDefinitionError} If the rendered params are invalid
   */
  params(ctx: ContextReader): P;
}

export interface StepFactoryDefinition<P> {
  id: string;
  kind: StepKind;
  summary: string;
  params: z.ZodType<P, z.ZodTypeDef, unknown>;
  build(input: StepBuildInput<P>): Step;
}

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((i) => `${i.path.join('.') || '(params)'}: ${i.message}`);
}

/**
 * Turn a typed factory definition into a catalog entry
 */
export function defineStep<P>(definition: StepFactoryDefinition<P>): StepFactory {
  const parse = (stepName: string, value: unknown): P => {
    const result = definition.params.safeParse(value);
    if (!result.success) {
      throw new PipelineDefinitionError(
        `Invalid params for step "${stepName}" (${definition.id})`,
        describeIssues(result.error)
      );
    }
    return result.data;
  };

  return Object.freeze({
    id: definition.id,
    kind: definition.kind,
    summary: definition.summary,

    check(params: ContextRecord): string[] {
      const result = definition.params.safeParse(params);
      return result.success ? [] : describeIssues(result.error);
    },

    create(input: StepCreateInput): Step {
      const dynamic = hasPlaceholders(input.with);
      return definition.build({
        name: input.name,
        description: input.description,
        raw: input.with,
        staticParams: dynamic ? undefined : parse(input.name, input.with),
        params: (ctx) => parse(input.name, dynamic ? renderValue(input.with, ctx) : input.with),
      });
    },
  });
}
