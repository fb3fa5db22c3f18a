/**
 * Log Sink
 *
 * Writes notifications through the structured logger. Used when no webhook
 * is configured. Notifications are written at NOTICE or above even when the
 * given logger's threshold is higher (the CLI logs at WARNING by default).
 *
 * @module @pipewright/engine/notifications/log-sink
 */

import { getLogger, type Logger } from '@pipewright/core';
import type { Notification, NotificationSink } from './types.js';

export class LogSink implements NotificationSink {
  readonly name = 'log';

  private readonly logger: Logger;

  constructor(logger: Logger = getLogger()) {
    this.logger = logger.isEnabled('NOTICE') ? logger : logger.child({}, { minSeverity: 'NOTICE' });
  }

  async post(notification: Notification): Promise<void> {
    const data = {
      title: notification.title,
      text: notification.text,
      runId: notification.runId,
      pipeline: notification.pipeline,
      environment: notification.environment,
      ...notification.fields,
    };

    switch (notification.level) {
      case 'error':
        this.logger.error('Notification', undefined, data);
        break;
      case 'warning':
        this.logger.warn('Notification', data);
        break;
      default:
        this.logger.notice('Notification', data);
    }
  }
}
