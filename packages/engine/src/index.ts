/**
 * Pipewright Engine
 *
 * Sequential deployment pipelines: typed steps over an explicit execution
 * context, validated before they run, executed with strict halting,
 * bounded retries, timeouts and cooperative cancellation.
 *
 * - Step contract and factories (analyze, mutating, validation, notify)
 * - Pipelines, definitions and the step catalog
 * - Runner, run reports and recording
 * - External adapters and notification sinks
 *
 * @module @pipewright/engine
 */

export * from './context/index.js';
export * from './step-contract/index.js';
export * from './pipeline/index.js';
export * from './run/index.js';
export * from './catalog/index.js';
export * from './adapters/index.js';
export * from './notifications/index.js';
