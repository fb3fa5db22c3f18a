/**
 * Run Report
 *
 * The durable record of one pipeline execution. Serializable both to
 * human-readable lines and to JSON for a calling automation system.
 *
 * @module @pipewright/engine/run/report
 */

import { z } from 'zod';
import { PipewrightError, type PipewrightErrorCode } from '@pipewright/core';
import { ContextValueSchema } from '../context/execution-context.js';
import { ErrorCode, StepResultSchema, type StepResult, type StepStatus } from '../step-contract/types.js';

// =============================================================================
// Schema
// =============================================================================

export const RunStatus = z.enum(['completed', 'halted_fatal']);
export type RunStatus = z.infer<typeof RunStatus>;

export const HaltReason = z.enum(['step_failed', 'cancelled']);
export type HaltReason = z.infer<typeof HaltReason>;

export const RunHaltSchema = z.object({
  /** Failing step, or the step that would have run next when cancelled */
  stepName: z.string(),
  reason: HaltReason,
  errorCode: ErrorCode,
  message: z.string(),
  remediation: z.string(),
});
export type RunHalt = z.infer<typeof RunHaltSchema>;

export const RunReportSchema = z.object({
  runId: z.string().min(1),
  pipeline: z.string().min(1),
  environment: z.string().min(1),
  status: RunStatus,
  dryRun: z.boolean(),
  startedAt: z.string().datetime(),
  completedAt: z.string().datetime(),
  durationMs: z.number().nonnegative(),
  steps: z.array(StepResultSchema),
  halt: RunHaltSchema.optional(),
  context: z.record(z.string(), ContextValueSchema),
});
export type RunReport = z.infer<typeof RunReportSchema>;

// =============================================================================
// Remediation
// =============================================================================

/**
 * Concise next step for an operator after a halt
 */
export function remediationFor(code: PipewrightErrorCode, stepName: string): string {
  switch (code) {
    case 'MISSING_PRECONDITION':
      return `Provide the missing value with --set key=value, or add a step before "${stepName}" that produces it.`;
    case 'EXTERNAL_CALL_FAILURE':
      return `Check connectivity and credentials for the service "${stepName}" calls, then re-run; completed steps are detected as already applied.`;
    case 'TIMEOUT':
      return `Raise the timeout for "${stepName}" (timeoutSeconds, or runner.stepTimeoutMs) or find out why it is slow, then re-run.`;
    case 'VALIDATION_FAILURE':
      return `Fix the reported violations in the target system; re-running "${stepName}" will not change the result until then.`;
    case 'UNDECLARED_OUTPUT':
      return `Declare the key in the "produces" list of "${stepName}" or stop writing it.`;
    case 'CANCELLED':
      return 'Re-run the pipeline to continue; steps that already completed will be detected as applied.';
    case 'NOTIFICATION_FAILURE':
      return 'Check the notification sink configuration (notifications.webhookUrl).';
    default:
      return `Inspect the run log for "${stepName}" and re-run with --verbose for details.`;
  }
}

// =============================================================================
// Human-readable Summary
// =============================================================================

const STATUS_LABELS: Record<StepStatus, string> = {
  success: '✓ success',
  skipped: '- skipped',
  failed_recoverable: '! failed (recoverable)',
  failed_fatal: '✗ failed (fatal)',
};

/**
 * One line for a step result
 */
export function formatStepLine(result: StepResult): string {
  const attempts = result.attempts > 1 ? `, ${result.attempts} attempts` : '';
  return `${STATUS_LABELS[result.status]}  ${result.stepName} (${result.elapsedMs}ms${attempts}): ${result.message}`;
}

/**
 * Human-readable lines: a header, one line per step, then the outcome
 */
export function summarizeRunReport(report: RunReport): string[] {
  const lines: string[] = [];
  const mode = report.dryRun ? ' [dry run]' : '';
  lines.push(`Run ${report.runId}: ${report.pipeline} → ${report.environment}${mode}`);

  for (const step of report.steps) {
    lines.push(`  ${formatStepLine(step)}`);
  }

  const recoverable = report.steps.filter((s) => s.status === 'failed_recoverable').length;
  if (report.status === 'completed') {
    const warning = recoverable > 0 ? ` with ${recoverable} recoverable failure${recoverable === 1 ? '' : 's'}` : '';
    lines.push(`Completed ${report.steps.length} steps in ${report.durationMs}ms${warning}`);
  } else if (report.halt) {
    const verb = report.halt.reason === 'cancelled' ? 'Cancelled before' : 'Halted at';
    lines.push(`${verb} step "${report.halt.stepName}" [${report.halt.errorCode}]: ${report.halt.message}`);
    lines.push(`Next step: ${report.halt.remediation}`);
  }

  return lines;
}

// =============================================================================
// Structured Form
// =============================================================================

/**
 * Plain JSON object for storage and `--json` output
 */
export function toRunReportJson(report: RunReport): RunReport {
  return RunReportSchema.parse(JSON.parse(JSON.stringify(report)));
}

/**
 * Parse and validate a stored or received report
 *
 * @throws {PipewrightError} INTERNAL_ERROR if the value is not a valid report
 */
export function parseRunReport(value: unknown): RunReport {
  const input = typeof value === 'string' ? parseJson(value) : value;
  const result = RunReportSchema.safeParse(input);
  if (!result.success) {
    const problems = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new PipewrightError(`Invalid run report: ${problems.join('; ')}`, {
      code: 'INTERNAL_ERROR',
      context: { problems },
    });
  }
  return result.data;
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new PipewrightError('Run report is not valid JSON', {
      code: 'INTERNAL_ERROR',
      cause: err instanceof Error ? err : undefined,
    });
  }
}
