/**
 * Notification Sinks
 *
 * @module @pipewright/engine/notifications
 */

export * from './types.js';
export { LogSink } from './log-sink.js';
export { WebhookSink, signPayload, SIGNATURE_HEADER, type WebhookSinkConfig } from './webhook-sink.js';
export { CompositeSink } from './composite-sink.js';
