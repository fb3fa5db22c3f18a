/**
 * Webhook Sink
 *
 * POSTs notifications as JSON to an HTTP endpoint (chat incoming webhook or
 * an internal relay). With a secret configured, the body is signed with
 * HMAC-SHA256 in the `X-Pipewright-Signature` header (`sha256=<hex>`).
 *
 * @module @pipewright/engine/notifications/webhook-sink
 */

import { createHmac } from 'node:crypto';
import { NotificationError } from '@pipewright/core';
import type { Notification, NotificationSink } from './types.js';

export const SIGNATURE_HEADER = 'X-Pipewright-Signature';

export interface WebhookSinkConfig {
  url: string;
  secret?: string;
  /** Request timeout (default: 10000) */
  timeoutMs?: number;
  /** Injected for tests; defaults to global fetch */
  fetch?: typeof fetch;
  /** Time source for the payload timestamp */
  clock?: () => Date;
}

/**
 * Sign a payload the way receivers verify it
 */
export function signPayload(body: string, secret: string): string {
  const hmac = createHmac('sha256', secret);
  hmac.update(body);
  return `sha256=${hmac.digest('hex')}`;
}

export class WebhookSink implements NotificationSink {
  readonly name = 'webhook';
  private readonly fetchImpl: typeof fetch;
  private readonly timeoutMs: number;
  private readonly clock: () => Date;

  constructor(private readonly config: WebhookSinkConfig) {
    this.fetchImpl = config.fetch ?? fetch;
    this.timeoutMs = config.timeoutMs ?? 10_000;
    this.clock = config.clock ?? (() => new Date());
  }

  async post(notification: Notification, signal?: AbortSignal): Promise<void> {
    const body = JSON.stringify({
      title: notification.title,
      text: notification.text,
      level: notification.level,
      runId: notification.runId,
      pipeline: notification.pipeline,
      environment: notification.environment,
      fields: notification.fields ?? {},
      timestamp: this.clock().toISOString(),
    });

    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.config.secret) {
      headers[SIGNATURE_HEADER] = signPayload(body, this.config.secret);
    }

    const timeout = AbortSignal.timeout(this.timeoutMs);
    let response: Response;
    try {
      response = await this.fetchImpl(this.config.url, {
        method: 'POST',
        headers,
        body,
        signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
      });
    } catch (error) {
      const cause = error instanceof Error ? error : undefined;
      throw new NotificationError(`Webhook delivery failed: ${cause?.message ?? String(error)}`, this.name, {
        cause,
      });
    }

    if (!response.ok) {
      throw new NotificationError(
        `Webhook responded ${response.status}${response.statusText ? ` ${response.statusText}` : ''}`,
        this.name,
        { responseCode: response.status }
      );
    }
  }
}
