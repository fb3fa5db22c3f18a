/**
 * Built-in Step Catalog
 *
 * @module @pipewright/engine/catalog/builtins
 */

import { StepCatalog } from '../catalog.js';
import type { StepServices } from '../types.js';
import { fileSteps } from './files.js';
import { iacSteps } from './iac.js';
import { k8sSteps } from './k8s.js';
import { notifySteps } from './notify.js';
import { vcsSteps } from './vcs.js';

export { DEFAULT_REVERT_BRANCH_PREFIX } from './vcs.js';
export { DEFAULT_ROLLOUT_TIMEOUT_SECONDS } from './k8s.js';
export { parseEnvFile } from './files.js';

/**
 * Catalog with every built-in step bound to the given services
 */
export function createBuiltinCatalog(services: StepServices): StepCatalog {
  return new StepCatalog([
    ...vcsSteps(services),
    ...fileSteps(services),
    ...iacSteps(services),
    ...k8sSteps(services),
    ...notifySteps(services),
  ]);
}
