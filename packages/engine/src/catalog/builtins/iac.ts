/**
 * Infrastructure-as-code steps
 *
 * @module @pipewright/engine/catalog/builtins/iac
 */

import { z } from 'zod';
import type { InfrastructurePlan } from '../../adapters/types.js';
import { mutatingStep, validationStep } from '../../step-contract/factories.js';
import type { StepContext } from '../../step-contract/types.js';
import { defineStep, type StepFactory, type StepServices } from '../types.js';
import { resolveWorkPath } from './shared.js';

export function iacSteps(services: StepServices): StepFactory[] {
  const validate = defineStep({
    id: 'iac.validate',
    kind: 'validation',
    summary: 'Check formatting and validate an infrastructure configuration',
    params: z.object({ directory: z.string().min(1) }).strict(),
    build: ({ name, description, params }) =>
      validationStep({
        name,
        description,
        check: async (ctx) => {
          const directory = resolveWorkPath(services.workdir, params(ctx).directory);
          const result = await services.infrastructure().validate(directory, ctx.signal);
          return result.diagnostics;
        },
      }),
  });

  const apply = defineStep({
    id: 'iac.apply',
    kind: 'mutating',
    summary: 'Apply an infrastructure configuration when its plan has changes',
    params: z
      .object({
        directory: z.string().min(1),
        variables: z.record(z.string(), z.string()).default({}),
      })
      .strict(),
    build: ({ name, description, params }) => {
      // Plan from the probe, reused by the dry-run preview of the same attempt
      const plans = new WeakMap<StepContext, InfrastructurePlan>();

      return mutatingStep({
        name,
        description,
        produces: ['infrastructureApplied'],
        probe: async (ctx) => {
          const { directory, variables } = params(ctx);
          const plan = await services
            .infrastructure()
            .plan(resolveWorkPath(services.workdir, directory), variables, ctx.signal);
          plans.set(ctx, plan);
          if (plan.changes === 0) {
            ctx.set('infrastructureApplied', true);
            return { applied: true, message: 'No infrastructure changes' };
          }
          return { applied: false };
        },
        preview: async (ctx) => {
          ctx.set('infrastructureApplied', false);
          return `Dry run: ${plans.get(ctx)?.summary ?? 'changes pending'}`;
        },
        apply: async (ctx) => {
          const { directory, variables } = params(ctx);
          const result = await services
            .infrastructure()
            .apply(resolveWorkPath(services.workdir, directory), variables, ctx.signal);
          ctx.set('infrastructureApplied', true);
          return result.summary;
        },
      });
    },
  });

  return [validate, apply];
}
