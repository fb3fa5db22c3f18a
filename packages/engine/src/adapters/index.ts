/**
 * External Adapters
 *
 * @module @pipewright/engine/adapters
 */

export * from './types.js';
export * from './command-runner.js';
export * from './git-workspace.js';
export * from './github-host.js';
export * from './kubectl.js';
export * from './terraform.js';
