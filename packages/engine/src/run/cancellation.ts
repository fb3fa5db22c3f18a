/**
 * Run Cancellation
 *
 * Cooperative cancellation: the runner checks the token before starting
 * each step and never interrupts a step mid-flight, since a mutating step
 * may be halfway through a side effect. Mutating steps are idempotent, so a
 * cancelled run is resumed by running it again.
 *
 * @module @pipewright/engine/run/cancellation
 */

import { EventEmitter } from 'node:events';
import { PipewrightError } from '@pipewright/core';

// =============================================================================
// Cancellation Token
// =============================================================================

/**
 * Reason for cancellation
 */
export interface CancellationReason {
  /** Who initiated cancellation */
  initiator: 'user' | 'system' | 'signal';
  /** Human-readable reason */
  reason: string;
  /** Timestamp when cancellation was requested */
  requestedAt: Date;
}

/**
 * Cancellation token for cooperative cancellation
 *
 * @example
 * ```typescript
 * for (const step of steps) {
 *   token.throwIfCancelled();
 *   await run(step);
 * }
 * ```
 */
export class CancellationToken {
  private _reason: CancellationReason | undefined;
  private readonly emitter = new EventEmitter();

  /**
   * Check if cancellation has been requested
   */
  get isCancelled(): boolean {
    return this._reason !== undefined;
  }

  /**
   * Get the cancellation reason (if cancelled)
   */
  get reason(): CancellationReason | undefined {
    return this._reason;
  }

  /**
   * Request cancellation; later requests are ignored
   */
  cancel(reason: CancellationReason): void {
    if (this._reason) {
      return;
    }
    this._reason = reason;
    this.emitter.emit('cancelled', reason);
  }

  /**
   * Register a callback for cancellation events
   */
  onCancelled(callback: (reason: CancellationReason) => void): () => void {
    this.emitter.on('cancelled', callback);
    return () => this.emitter.off('cancelled', callback);
  }

  /**
   * Throw CancelledError if cancellation has been requested
   */
  throwIfCancelled(): void {
    if (this._reason) {
      throw new CancelledError(this._reason);
    }
  }
}

/**
 * Error raised when a run is cancelled
 */
export class CancelledError extends PipewrightError {
  readonly reason: CancellationReason;

  constructor(reason: CancellationReason) {
    super(`Run cancelled: ${reason.reason}`, {
      code: 'CANCELLED',
      retryable: false,
      context: { initiator: reason.initiator },
    });
    this.name = 'CancelledError';
    this.reason = reason;
  }
}

/**
 * Check if an error is a CancelledError
 */
export function isCancelledError(error: unknown): error is CancelledError {
  return error instanceof CancelledError;
}

// =============================================================================
// Cancellation Token Source
// =============================================================================

/**
 * Owner side of a token: whoever holds the source can cancel
 */
export class CancellationTokenSource {
  private readonly token = new CancellationToken();
  private _isDisposed = false;

  /**
   * Get the cancellation token
   */
  getToken(): CancellationToken {
    return this.token;
  }

  /**
   * Request cancellation
   */
  cancel(reason: Omit<CancellationReason, 'requestedAt'>): void {
    if (this._isDisposed) {
      throw new Error('CancellationTokenSource has been disposed');
    }
    this.token.cancel({ ...reason, requestedAt: new Date() });
  }

  get isCancelled(): boolean {
    return this.token.isCancelled;
  }

  /**
   * Dispose the source (cannot cancel after disposal)
   */
  dispose(): void {
    this._isDisposed = true;
  }
}
