/**
 * @module @pipewright/engine/context
 */

export * from './execution-context.js';
