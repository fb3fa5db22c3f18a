/**
 * Container orchestration steps
 *
 * @module @pipewright/engine/catalog/builtins/k8s
 */

import { z } from 'zod';
import { mutatingStep, validationStep } from '../../step-contract/factories.js';
import { defineStep, type StepFactory, type StepServices } from '../types.js';
import { namespaceFor, resolveWorkPath } from './shared.js';

/** kubectl rollout status default wait */
export const DEFAULT_ROLLOUT_TIMEOUT_SECONDS = 300;

/** Headroom over the rollout wait before the step itself times out */
const ROLLOUT_STEP_GRACE_MS = 30_000;

const Manifests = z.array(z.string().min(1)).min(1);

/**
 * Step timeout covering the rollout wait plus headroom. Known whenever the
 * wait is a literal (or left at its default), even if other params are
 * templated; undefined when the wait itself is a placeholder.
 */
function rolloutStepTimeoutMs(raw: Record<string, unknown>): number | undefined {
  const waitSeconds = raw.timeoutSeconds ?? DEFAULT_ROLLOUT_TIMEOUT_SECONDS;
  return typeof waitSeconds === 'number' ? waitSeconds * 1000 + ROLLOUT_STEP_GRACE_MS : undefined;
}

export function k8sSteps(services: StepServices): StepFactory[] {
  const paths = (manifests: string[]) => manifests.map((m) => resolveWorkPath(services.workdir, m));
  // Without an explicit namespace the run's environment is the namespace
  const namespaceRequires = (raw: Record<string, unknown>) => ('namespace' in raw ? [] : ['environment']);

  const validateManifests = defineStep({
    id: 'k8s.validate-manifests',
    kind: 'validation',
    summary: 'Client-side validation of manifests',
    params: z.object({ manifests: Manifests }).strict(),
    build: ({ name, description, params }) =>
      validationStep({
        name,
        description,
        check: async (ctx) => services.orchestration().validateManifests(paths(params(ctx).manifests), ctx.signal),
      }),
  });

  const apply = defineStep({
    id: 'k8s.apply',
    kind: 'mutating',
    summary: 'Apply manifests to the environment namespace (server-side dry run when previewing)',
    params: z.object({ manifests: Manifests, namespace: z.string().min(1).optional() }).strict(),
    build: ({ name, description, raw, params }) =>
      mutatingStep({
        name,
        description,
        requires: namespaceRequires(raw),
        produces: ['appliedManifests'],
        preview: async (ctx) => {
          const { manifests, namespace } = params(ctx);
          const ns = namespaceFor(ctx, namespace);
          const lines = await services
            .orchestration()
            .applyManifests(paths(manifests), ns, { dryRun: true, signal: ctx.signal });
          ctx.set('appliedManifests', lines);
          return `Dry run: ${lines.length} resource(s) accepted by ${ns}`;
        },
        apply: async (ctx) => {
          const { manifests, namespace } = params(ctx);
          const ns = namespaceFor(ctx, namespace);
          const lines = await services.orchestration().applyManifests(paths(manifests), ns, { signal: ctx.signal });
          ctx.set('appliedManifests', lines);
          return `Applied ${lines.length} resource(s) to ${ns}`;
        },
      }),
  });

  const rolloutStatus = defineStep({
    id: 'k8s.rollout-status',
    kind: 'validation',
    summary: 'Wait for a rollout to become ready',
    params: z
      .object({
        resource: z.string().min(1),
        namespace: z.string().min(1).optional(),
        timeoutSeconds: z.number().int().positive().default(DEFAULT_ROLLOUT_TIMEOUT_SECONDS),
      })
      .strict(),
    build: ({ name, description, raw, params }) =>
      validationStep({
        name,
        description,
        requires: namespaceRequires(raw),
        skipInDryRun: true,
        timeoutMs: rolloutStepTimeoutMs(raw),
        check: async (ctx) => {
          const { resource, namespace, timeoutSeconds } = params(ctx);
          const ns = namespaceFor(ctx, namespace);
          const status = await services.orchestration().rolloutStatus(resource, ns, timeoutSeconds, ctx.signal);
          return status.ready ? [] : [`Rollout of ${resource} in ${ns} is not ready: ${status.message}`];
        },
      }),
  });

  const scale = defineStep({
    id: 'k8s.scale',
    kind: 'mutating',
    summary: 'Scale a workload to a replica count',
    params: z
      .object({
        resource: z.string().min(1),
        replicas: z.number().int().nonnegative(),
        namespace: z.string().min(1).optional(),
      })
      .strict(),
    build: ({ name, description, raw, params }) =>
      mutatingStep({
        name,
        description,
        requires: namespaceRequires(raw),
        probe: async (ctx) => {
          const { resource, replicas, namespace } = params(ctx);
          const current = await services.orchestration().getReplicas(resource, namespaceFor(ctx, namespace), ctx.signal);
          return current === replicas
            ? { applied: true, message: `${resource} already at ${replicas} replica(s)` }
            : { applied: false };
        },
        preview: async (ctx) => {
          const { resource, replicas } = params(ctx);
          return `Dry run: would scale ${resource} to ${replicas} replica(s)`;
        },
        apply: async (ctx) => {
          const { resource, replicas, namespace } = params(ctx);
          await services.orchestration().scale(resource, namespaceFor(ctx, namespace), replicas, ctx.signal);
          return `Scaled ${resource} to ${replicas} replica(s)`;
        },
      }),
  });

  return [validateManifests, apply, rolloutStatus, scale];
}
