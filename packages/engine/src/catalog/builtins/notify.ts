/**
 * Notification step
 *
 * @module @pipewright/engine/catalog/builtins/notify
 */

import { z } from 'zod';
import { notifyStep } from '../../step-contract/factories.js';
import { defineStep, type StepFactory, type StepServices } from '../types.js';

export function notifySteps(services: StepServices): StepFactory[] {
  const post = defineStep({
    id: 'notify.post',
    kind: 'notify',
    summary: 'Post a rendered message to the configured notification sink',
    params: z
      .object({
        title: z.string().min(1).optional(),
        message: z.string().min(1),
        level: z.enum(['info', 'success', 'warning', 'error']).default('info'),
      })
      .strict(),
    build: ({ name, description, params }) =>
      notifyStep({
        name,
        description,
        sink: services.notifications,
        level: (ctx) => params(ctx).level,
        title: (ctx) => params(ctx).title ?? `${ctx.pipeline} → ${ctx.environment}`,
        message: (ctx) => params(ctx).message,
      }),
  });

  return [post];
}
