/**
 * Reliability Primitives
 *
 * Error taxonomy and bounded retry shared by the engine, the stores and the CLI.
 *
 * @module @pipewright/core/reliability
 */

export {
  type PipewrightErrorCode,
  PIPEWRIGHT_ERROR_CODES,
  type PipewrightErrorOptions,
  PipewrightError,
  MissingPreconditionError,
  ExternalCallError,
  ValidationFailureError,
  NotificationError,
  StepTimeoutError,
  UndeclaredOutputError,
  PipelineDefinitionError,
  ConfigurationError,
  RunNotFoundError,
  RunInProgressError,
  isRetryable,
  errorCodeOf,
  exitCodeFor,
  toExitCode,
  wrapError,
} from './errors.js';

export {
  type RetryConfig,
  type RetryResult,
  DEFAULT_RETRY_CONFIG,
  calculateDelay,
  sleep,
  retryWithResult,
} from './retry.js';
