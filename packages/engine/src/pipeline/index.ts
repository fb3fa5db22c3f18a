/**
 * Pipelines: construction, validation, definitions and parameter templates
 *
 * @module @pipewright/engine/pipeline
 */

export * from './pipeline.js';
export * from './validation.js';
export * from './definition.js';
export * from './template.js';
