/**
 * Telemetry Context Module
 *
 * Defines the telemetry context that flows through a pipeline run, so every
 * log line emitted inside a run carries the run, pipeline and environment.
 *
 * @module @pipewright/core/telemetry/context
 */

import { AsyncLocalStorage } from 'node:async_hooks';

// =============================================================================
// Telemetry Context Types
// =============================================================================

/**
 * Source of the telemetry event
 */
export type TelemetrySource = 'cli' | 'runner' | 'test' | 'internal';

/**
 * Severity levels (aligned with Cloud Logging)
 */
export type Severity = 'DEBUG' | 'INFO' | 'NOTICE' | 'WARNING' | 'ERROR' | 'CRITICAL';

export const SEVERITIES: readonly Severity[] = ['DEBUG', 'INFO', 'NOTICE', 'WARNING', 'ERROR', 'CRITICAL'];

/**
 * Context that flows through one pipeline run
 */
export interface TelemetryContext {
  /** Run identifier */
  runId?: string;
  /** Pipeline name */
  pipeline?: string;
  /** Target environment (staging, production, ...) */
  environment?: string;
  /** Step currently executing */
  stepName?: string;
  /** Service that generated this telemetry */
  source: TelemetrySource;
  /** Timestamp when context was created */
  timestamp: Date;
}

export type PartialTelemetryContext = Partial<TelemetryContext>;

// =============================================================================
// Async Local Storage for Context Propagation
// =============================================================================

const telemetryStorage = new AsyncLocalStorage<TelemetryContext>();

/**
 * Get the current telemetry context from async local storage
 */
export function getCurrentContext(): TelemetryContext | undefined {
  return telemetryStorage.getStore();
}

/**
 * Create a new context, inheriting unset fields from the current one
 */
export function createContext(fields: PartialTelemetryContext = {}): TelemetryContext {
  const parent = getCurrentContext();
  return {
    ...parent,
    ...fields,
    source: fields.source ?? parent?.source ?? 'internal',
    timestamp: new Date(),
  };
}

/**
 * Run a function with the given telemetry context
 */
export function runWithContext<T>(ctx: TelemetryContext, fn: () => T): T {
  return telemetryStorage.run(ctx, fn);
}

/**
 * Run a function in a child context extending the current one
 */
export function withContext<T>(fields: PartialTelemetryContext, fn: () => T): T {
  return runWithContext(createContext(fields), fn);
}

/**
 * Parse a severity name (case-insensitive); unknown names yield undefined
 */
export function parseSeverity(value: string | undefined): Severity | undefined {
  if (!value) return undefined;
  const upper = value.toUpperCase();
  if (upper === 'WARN') return 'WARNING';
  return SEVERITIES.find((s) => s === upper);
}
