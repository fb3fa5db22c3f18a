/**
 * Notification Types
 *
 * @module @pipewright/engine/notifications/types
 */

export type NotificationLevel = 'info' | 'success' | 'warning' | 'error';

/**
 * A human-readable status update
 */
export interface Notification {
  title: string;
  text: string;
  level: NotificationLevel;
  runId: string;
  pipeline: string;
  environment: string;
  /** Extra key/value details (rendered as fields by chat sinks) */
  fields?: Record<string, string>;
}

/**
 * Destination for notifications (chat webhook, log stream)
 */
export interface NotificationSink {
  readonly name: string;

  /**
   * Deliver a notification
   *
   * @throws {NotificationError} On delivery failure
   */
  post(notification: Notification, signal?: AbortSignal): Promise<void>;
}
