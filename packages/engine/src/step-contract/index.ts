/**
 * Step Contract
 *
 * @module @pipewright/engine/step-contract
 */

export {
  StepKind,
  StepStatus,
  STATUS_CONTINUE_MAP,
  ErrorCode,
  StepResultSchema,
  type StepContext,
  type StepOutcome,
  type StepAction,
  type Step,
  type StepResult,
} from './types.js';

export {
  analyzeStep,
  mutatingStep,
  validationStep,
  notifyStep,
  type AnalyzeStepOptions,
  type MutatingStepOptions,
  type ProbeResult,
  type ValidationStepOptions,
  type NotifyStepOptions,
} from './factories.js';
