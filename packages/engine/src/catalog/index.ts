/**
 * Step Catalog
 *
 * @module @pipewright/engine/catalog
 */

export * from './types.js';
export { StepCatalog } from './catalog.js';
export { buildPipeline, type BuildPipelineOptions } from './build.js';
export * from './builtins/index.js';
