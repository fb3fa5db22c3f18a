/**
 * Composite Sink
 *
 * Posts to every sink in turn. All sinks are attempted; failures are
 * reported together afterwards.
 *
 * @module @pipewright/engine/notifications/composite-sink
 */

import { NotificationError } from '@pipewright/core';
import type { Notification, NotificationSink } from './types.js';

export class CompositeSink implements NotificationSink {
  readonly name: string;

  constructor(private readonly sinks: readonly NotificationSink[]) {
    this.name = sinks.map((s) => s.name).join('+') || 'none';
  }

  async post(notification: Notification, signal?: AbortSignal): Promise<void> {
    const failures: string[] = [];
    for (const sink of this.sinks) {
      try {
        await sink.post(notification, signal);
      } catch (error) {
        failures.push(`${sink.name}: ${error instanceof Error ? error.message : String(error)}`);
      }
    }
    if (failures.length > 0) {
      throw new NotificationError(`Notification failed for ${failures.join('; ')}`, this.name);
    }
  }
}
