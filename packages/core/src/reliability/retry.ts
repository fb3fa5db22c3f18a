/**
 * Retry Utilities
 *
 * Bounded retry with a fixed (or optionally growing) delay, integrated with
 * the Pipewright error taxonomy. The attempt count is always explicit: there
 * is no open-ended retry.
 *
 * @module @pipewright/core/reliability/retry
 */

import { PipewrightError, isRetryable } from './errors.js';

// =============================================================================
// Retry Configuration
// =============================================================================

/**
 * Retry configuration options
 */
export interface RetryConfig {
  /** Total attempts including the first (default: 2) */
  maxAttempts: number;

  /** Delay between attempts in ms (default: 2000) */
  delayMs: number;

  /** Delay multiplier per attempt; 1 keeps the delay fixed (default: 1) */
  backoffMultiplier: number;

  /** Upper bound on any single delay in ms (default: 60000) */
  maxDelayMs: number;

  /** Custom function to determine if error is retryable */
  isRetryable?: (error: unknown) => boolean;

  /** Callback before each retry attempt */
  onRetry?: (attempt: number, error: unknown, nextDelayMs: number) => void;

  /** Abort signal to cancel pending retries */
  signal?: AbortSignal;
}

/**
 * Default retry configuration
 */
export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 2,
  delayMs: 2000,
  backoffMultiplier: 1,
  maxDelayMs: 60000,
};

// =============================================================================
// Retry Result
// =============================================================================

interface RetryAttempts {
  /** Number of attempts made */
  attempts: number;

  /** Total time spent in ms */
  totalTimeMs: number;

  /** Errors from each failed attempt */
  attemptErrors: Array<{
    attempt: number;
    error: unknown;
  }>;
}

/**
 * Result of a retry operation
 */
export type RetryResult<T> =
  | (RetryAttempts & { success: true; result: T })
  | (RetryAttempts & { success: false; error: unknown });

// =============================================================================
// Delay Calculation
// =============================================================================

/**
 * Delay before the retry that follows a given attempt
 *
 * @param attempt - Attempt that just failed (1-indexed)
 */
export function calculateDelay(attempt: number, config: RetryConfig): number {
  const delay = config.delayMs * Math.pow(config.backoffMultiplier, attempt - 1);
  return Math.min(Math.round(delay), config.maxDelayMs);
}

/**
 * Sleep for a given duration; rejects if the signal aborts first
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortError());
      return;
    }

    const onAbort = () => {
      clearTimeout(timeout);
      reject(abortError());
    };
    const timeout = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

function abortError(): PipewrightError {
  return new PipewrightError('Retry aborted', { code: 'CANCELLED', retryable: false });
}

// =============================================================================
// Retry Functions
// =============================================================================

/**
 * Execute an async function with retry logic and return a detailed result
 *
 * Never throws for failures of `fn`; a non-retryable error ends the loop
 * immediately. Throws only if the signal aborts during a delay.
 *
 * @example
 * ```typescript
 * const result = await retryWithResult(() => host.getPullRequest(repo, 42), {
 *   maxAttempts: 2,
 *   delayMs: 2000,
 * });
 * ```
 */
export async function retryWithResult<T>(
  fn: (attempt: number) => Promise<T>,
  config?: Partial<RetryConfig>
): Promise<RetryResult<T>> {
  const fullConfig: RetryConfig = { ...DEFAULT_RETRY_CONFIG, ...config };
  const startTime = Date.now();
  const attemptErrors: RetryResult<T>['attemptErrors'] = [];
  const shouldRetry = fullConfig.isRetryable ?? isRetryable;
  const maxAttempts = Math.max(1, fullConfig.maxAttempts);

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      const result = await fn(attempt);
      return {
        success: true,
        result,
        attempts: attempt,
        totalTimeMs: Date.now() - startTime,
        attemptErrors,
      };
    } catch (error) {
      attemptErrors.push({ attempt, error });

      if (!shouldRetry(error) || attempt === maxAttempts) {
        return {
          success: false,
          error,
          attempts: attempt,
          totalTimeMs: Date.now() - startTime,
          attemptErrors,
        };
      }

      const delayMs = calculateDelay(attempt, fullConfig);
      fullConfig.onRetry?.(attempt, error, delayMs);
      await sleep(delayMs, fullConfig.signal);
    }
  }

  // Unreachable: the loop always returns on the last attempt
  throw new Error('Retry exhausted');
}
