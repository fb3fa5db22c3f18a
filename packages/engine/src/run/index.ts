/**
 * Run Module
 *
 * The runner, cancellation, run reports and their persistence.
 *
 * @module @pipewright/engine/run
 */

export * from './runner.js';
export * from './cancellation.js';
export * from './report.js';
export * from './recorder.js';
export { StagedStepContext, type StagedStepContextOptions } from './step-context.js';
