/**
 * Error Taxonomy
 *
 * Standard error types with clear semantics for retry, reporting and exit codes.
 *
 * Hard rules:
 * - Every error has a code for programmatic handling
 * - Every error knows if it's retryable
 * - Every error maps to an exit code
 *
 * @module @pipewright/core/reliability/errors
 */

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Standard Pipewright error codes
 */
export const PIPEWRIGHT_ERROR_CODES = [
  // Step failures
  'MISSING_PRECONDITION',
  'EXTERNAL_CALL_FAILURE',
  'VALIDATION_FAILURE',
  'NOTIFICATION_FAILURE',
  'TIMEOUT',
  'UNDECLARED_OUTPUT',
  'CANCELLED',

  // Definition and lookup errors
  'DEFINITION_ERROR',
  'NOT_FOUND',
  'RUN_IN_PROGRESS',

  // Internal errors
  'INTERNAL_ERROR',
  'CONFIGURATION_ERROR',
] as const;

export type PipewrightErrorCode = (typeof PIPEWRIGHT_ERROR_CODES)[number];

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Pipewright error options
 */
export interface PipewrightErrorOptions {
  /** Error code */
  code: PipewrightErrorCode;

  /** Whether the error is retryable */
  retryable?: boolean;

  /** Additional context for debugging */
  context?: Record<string, unknown>;

  /** Underlying cause */
  cause?: Error;
}

/**
 * Base Pipewright error class
 *
 * All Pipewright errors extend this for consistent handling.
 */
export class PipewrightError extends Error {
  readonly code: PipewrightErrorCode;
  readonly retryable: boolean;
  readonly context?: Record<string, unknown>;
  readonly cause?: Error;
  readonly timestamp: Date;

  constructor(message: string, options: PipewrightErrorOptions) {
    super(message);
    this.name = 'PipewrightError';
    this.code = options.code;
    this.retryable = options.retryable ?? false;
    this.context = options.context;
    this.cause = options.cause;
    this.timestamp = new Date();

    // Maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Convert to JSON for logging and reports
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
      cause: this.cause?.message,
    };
  }
}

// =============================================================================
// Step Failure Errors
// =============================================================================

/**
 * A step's required context key is absent.
 *
 * Indicates a malformed pipeline or missing run input; never retried.
 */
export class MissingPreconditionError extends PipewrightError {
  readonly key: string;

  constructor(key: string, options?: { stepName?: string; context?: Record<string, unknown> }) {
    const where = options?.stepName ? ` required by step "${options.stepName}"` : '';
    super(`Missing context key "${key}"${where}`, {
      code: 'MISSING_PRECONDITION',
      retryable: false,
      context: { key, stepName: options?.stepName, ...options?.context },
    });
    this.name = 'MissingPreconditionError';
    this.key = key;
  }
}

/**
 * Transient failure calling an external collaborator (VCS host, cluster API, IaC tool)
 */
export class ExternalCallError extends PipewrightError {
  readonly service: string;

  constructor(
    message: string,
    service: string,
    options?: { context?: Record<string, unknown>; cause?: Error }
  ) {
    super(message, {
      code: 'EXTERNAL_CALL_FAILURE',
      retryable: true,
      context: { service, ...options?.context },
      cause: options?.cause,
    });
    this.name = 'ExternalCallError';
    this.service = service;
  }
}

/**
 * An invariant about external state did not hold.
 *
 * Retrying a validation will not change reality, so this is never retried.
 */
export class ValidationFailureError extends PipewrightError {
  readonly violations: string[];

  constructor(message: string, violations: string[] = [], options?: { context?: Record<string, unknown> }) {
    super(message, {
      code: 'VALIDATION_FAILURE',
      retryable: false,
      context: { violations, ...options?.context },
    });
    this.name = 'ValidationFailureError';
    this.violations = violations;
  }
}

/**
 * A notification could not be delivered
 */
export class NotificationError extends PipewrightError {
  readonly sink: string;
  readonly responseCode?: number;

  constructor(
    message: string,
    sink: string,
    options?: { responseCode?: number; cause?: Error }
  ) {
    super(message, {
      code: 'NOTIFICATION_FAILURE',
      retryable: false,
      context: { sink, responseCode: options?.responseCode },
      cause: options?.cause,
    });
    this.name = 'NotificationError';
    this.sink = sink;
    this.responseCode = options?.responseCode;
  }
}

/**
 * Timeout error - step exceeded its time limit
 *
 * Retryable unless the timed-out attempt was still running after the grace
 * period (`stillRunningAfterMs`): a new attempt would run beside it.
 */
export class StepTimeoutError extends PipewrightError {
  readonly timeoutMs: number;
  readonly stillRunningAfterMs?: number;

  constructor(stepName: string, timeoutMs: number, options?: { stillRunningAfterMs?: number }) {
    const stillRunning = options?.stillRunningAfterMs;
    super(
      stillRunning === undefined
        ? `Step "${stepName}" timed out after ${timeoutMs}ms`
        : `Step "${stepName}" timed out after ${timeoutMs}ms and did not stop within ${stillRunning}ms`,
      {
        code: 'TIMEOUT',
        retryable: stillRunning === undefined,
        context: { stepName, timeoutMs, stillRunningAfterMs: stillRunning },
      }
    );
    this.name = 'StepTimeoutError';
    this.timeoutMs = timeoutMs;
    this.stillRunningAfterMs = stillRunning;
  }
}

/**
 * A step tried to write a context key it did not declare in `produces`
 */
export class UndeclaredOutputError extends PipewrightError {
  readonly key: string;

  constructor(stepName: string, key: string, declared: readonly string[]) {
    super(
      `Step "${stepName}" wrote undeclared context key "${key}" (declared: ${declared.join(', ') || 'none'})`,
      {
        code: 'UNDECLARED_OUTPUT',
        retryable: false,
        context: { stepName, key, declared: [...declared] },
      }
    );
    this.name = 'UndeclaredOutputError';
    this.key = key;
  }
}

// =============================================================================
// Definition and Lookup Errors
// =============================================================================

/**
 * Pipeline definition is malformed (duplicate names, unsatisfied preconditions, bad YAML)
 */
export class PipelineDefinitionError extends PipewrightError {
  readonly problems: string[];

  constructor(message: string, problems: string[] = [], options?: { source?: string; cause?: Error }) {
    super(problems.length > 0 ? `${message}:\n  - ${problems.join('\n  - ')}` : message, {
      code: 'DEFINITION_ERROR',
      retryable: false,
      context: { source: options?.source, problems },
      cause: options?.cause,
    });
    this.name = 'PipelineDefinitionError';
    this.problems = problems;
  }
}

/**
 * Configuration could not be loaded or failed validation
 */
export class ConfigurationError extends PipewrightError {
  readonly fieldErrors?: Record<string, string>;

  constructor(message: string, options?: { fieldErrors?: Record<string, string>; cause?: Error }) {
    super(message, {
      code: 'CONFIGURATION_ERROR',
      retryable: false,
      context: { fieldErrors: options?.fieldErrors },
      cause: options?.cause,
    });
    this.name = 'ConfigurationError';
    this.fieldErrors = options?.fieldErrors;
  }
}

/**
 * No stored run matches the requested identifier
 */
export class RunNotFoundError extends PipewrightError {
  readonly runId: string;

  constructor(runId: string) {
    super(`No run found with id "${runId}"`, {
      code: 'NOT_FOUND',
      retryable: false,
      context: { runId },
    });
    this.name = 'RunNotFoundError';
    this.runId = runId;
  }
}

/**
 * Another run of the same pipeline and environment is recorded as running
 */
export class RunInProgressError extends PipewrightError {
  readonly activeRunId: string;

  constructor(pipeline: string, environment: string, activeRunId: string) {
    super(
      `Pipeline "${pipeline}" is already running in "${environment}" (run ${activeRunId})`,
      {
        code: 'RUN_IN_PROGRESS',
        retryable: false,
        context: { pipeline, environment, activeRunId },
      }
    );
    this.name = 'RunInProgressError';
    this.activeRunId = activeRunId;
  }
}

// =============================================================================
// Helper Functions
// =============================================================================

/**
 * Check if an error is retryable
 *
 * Errors outside the taxonomy count as retryable: the caller decides
 * whether the step allows retries at all.
 */
export function isRetryable(error: unknown): boolean {
  if (error instanceof PipewrightError) {
    return error.retryable;
  }
  return true;
}

/**
 * Error code of any thrown value
 */
export function errorCodeOf(error: unknown): PipewrightErrorCode {
  return error instanceof PipewrightError ? error.code : 'INTERNAL_ERROR';
}

/**
 * Map an error code to a CLI exit code
 */
export function exitCodeFor(code: PipewrightErrorCode): number {
  switch (code) {
    // Transient external failures (10-19)
    case 'EXTERNAL_CALL_FAILURE':
      return 10;
    case 'TIMEOUT':
      return 11;
    case 'NOTIFICATION_FAILURE':
      return 12;

    // Validation and definition errors (20-29)
    case 'VALIDATION_FAILURE':
      return 20;
    case 'MISSING_PRECONDITION':
      return 21;
    case 'UNDECLARED_OUTPUT':
      return 22;
    case 'DEFINITION_ERROR':
      return 23;
    case 'NOT_FOUND':
      return 24;
    case 'RUN_IN_PROGRESS':
      return 25;

    // Internal errors (40-49)
    case 'INTERNAL_ERROR':
      return 40;
    case 'CONFIGURATION_ERROR':
      return 41;

    // Interrupted (128 + SIGINT)
    case 'CANCELLED':
      return 130;

    default:
      return 1;
  }
}

/**
 * Map an error to a CLI exit code
 */
export function toExitCode(error: unknown): number {
  if (!(error instanceof PipewrightError)) {
    return 1; // Generic error
  }
  return exitCodeFor(error.code);
}

/**
 * Wrap any error as a PipewrightError
 */
export function wrapError(error: unknown, defaults?: Partial<PipewrightErrorOptions>): PipewrightError {
  if (error instanceof PipewrightError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error ? error : undefined;

  return new PipewrightError(message, {
    code: defaults?.code ?? 'INTERNAL_ERROR',
    retryable: defaults?.retryable ?? true,
    cause,
    context: defaults?.context,
  });
}
