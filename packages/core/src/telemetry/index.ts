/**
 * Telemetry Module
 *
 * - AsyncLocalStorage-based context propagation (run, pipeline, environment)
 * - Structured JSON logging with secret redaction
 *
 * @module @pipewright/core/telemetry
 */

export {
  type TelemetrySource,
  type Severity,
  type TelemetryContext,
  type PartialTelemetryContext,
  SEVERITIES,
  getCurrentContext,
  createContext,
  runWithContext,
  withContext,
  parseSeverity,
} from './context.js';

export {
  type LoggerConfig,
  type LogEntry,
  Logger,
  getLogger,
  setLogger,
  createLogger,
} from './logger.js';
