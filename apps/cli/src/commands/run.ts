/**
 * Run Command
 *
 * Execute a pipeline against an environment.
 *
 * Usage:
 *   pipewright run --pipeline deploy --environment staging --set image=web:1.4.0
 *   pipewright run --pipeline deploy --environment production --dry-run --json
 */

import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import {
  ConfigurationError,
  MissingPreconditionError,
  RunInProgressError,
  exitCodeFor,
  type Logger,
  type RunReportStore,
} from '@pipewright/core';
import {
  CancellationTokenSource,
  ExecutionContext,
  PipelineRunner,
  RunRecorder,
  buildPipeline,
  createBuiltinCatalog,
  findPipelineDefinition,
  formatStepLine,
  summarizeRunReport,
  toRunReportJson,
  type ContextValue,
  type Pipeline,
  type RunObserver,
  type RunReport,
  type StepResult,
  type StepServices,
  type StepStartEvent,
  type StepStatus,
} from '@pipewright/engine';
import {
  createCommandLogger,
  createStepServices,
  loadCommandConfig,
  openRunStore,
  pipelinesDir,
  type CommandEnvironment,
} from '../services.js';

// =============================================================================
// Types
// =============================================================================

export interface RunCommandOptions {
  pipeline: string;
  environment: string;
  /** `key=value` pairs seeded into the context */
  set?: string[];
  dryRun?: boolean;
  /** Start even if another run of this pipeline and environment is recorded as running */
  force?: boolean;
  json?: boolean;
  verbose?: boolean;
}

/**
 * Anything that delivers SIGINT (process, or an emitter in tests)
 */
export interface SignalSource {
  on(event: 'SIGINT', listener: () => void): unknown;
  off(event: 'SIGINT', listener: () => void): unknown;
}

export interface RunCommandDeps extends CommandEnvironment {
  services?: StepServices;
  store?: RunReportStore;
  logger?: Logger;
  signals?: SignalSource;
  /** Called on a second SIGINT (default: process.exit) */
  exit?: (code: number) => void;
  clock?: () => Date;
}

// =============================================================================
// Context Seeding
// =============================================================================

/**
 * Parse repeated `--set key=value` options. Values that parse as JSON
 * numbers or booleans keep that type; everything else stays a string.
 *
 * @throws {ConfigurationError} For a pair without `=` or with an empty key
 */
export function parseSetPairs(pairs: string[] = []): Record<string, ContextValue> {
  const values: Record<string, ContextValue> = {};
  for (const pair of pairs) {
    const eq = pair.indexOf('=');
    if (eq <= 0) {
      throw new ConfigurationError(`Invalid --set value "${pair}". Use key=value.`);
    }
    values[pair.slice(0, eq).trim()] = coerceSetValue(pair.slice(eq + 1));
  }
  return values;
}

function coerceSetValue(value: string): ContextValue {
  if (value === 'true') return true;
  if (value === 'false') return false;
  if (/^-?\d+(\.\d+)?$/.test(value)) return Number(value);
  return value;
}

/**
 * Check the caller seeded every declared input
 *
 * @throws {MissingPreconditionError} Naming the first absent input
 */
function requireInputs(pipeline: Pipeline, context: ExecutionContext): void {
  const missing = pipeline.inputs.find((key) => !context.has(key));
  if (missing !== undefined) {
    throw new MissingPreconditionError(missing, { context: { pipeline: pipeline.name, input: true } });
  }
}

// =============================================================================
// Progress Output
// =============================================================================

const STATUS_COLORS: Record<StepStatus, (text: string) => string> = {
  success: chalk.green,
  skipped: chalk.dim,
  failed_recoverable: chalk.yellow,
  failed_fatal: chalk.red,
};

function timestamp(date: Date): string {
  return date.toISOString().slice(11, 19);
}

/**
 * Prints each step outcome as it completes
 */
class ProgressPrinter implements RunObserver {
  constructor(
    private readonly spinner: Ora,
    private readonly clock: () => Date
  ) {}

  onStepStart(event: StepStartEvent): void {
    this.spinner.start(`[${event.index + 1}/${event.total}] ${event.stepName}`);
  }

  onStepComplete(result: StepResult): void {
    this.spinner.stop();
    console.log(`${chalk.dim(timestamp(this.clock()))} ${STATUS_COLORS[result.status](formatStepLine(result))}`);
  }
}

function printOutcome(report: RunReport): void {
  const outcome = summarizeRunReport(report).slice(1 + report.steps.length);
  for (const line of outcome) {
    if (line.startsWith('Next step:')) {
      console.log(chalk.yellow(line));
    } else {
      console.log(report.status === 'completed' ? chalk.green(line) : chalk.red(line));
    }
  }
}

// =============================================================================
// Command
// =============================================================================

/**
 * Exit code for a finished run
 */
export function runExitCode(report: RunReport): number {
  return report.halt ? exitCodeFor(report.halt.errorCode) : 0;
}

/**
 * Execute the run command
 *
 * @returns The run report; a halted run is a result, not a thrown error
 */
export async function runCommand(options: RunCommandOptions, deps: RunCommandDeps = {}): Promise<RunReport> {
  const config = loadCommandConfig(deps);
  const logger = deps.logger ?? createCommandLogger(options.verbose, deps);
  const clock = deps.clock ?? (() => new Date());
  const services = deps.services ?? createStepServices(config, logger, deps);

  const { definition, path } = await findPipelineDefinition(pipelinesDir(config, deps), options.pipeline);
  const pipeline = buildPipeline(definition, createBuiltinCatalog(services), { source: path });

  const context = new ExecutionContext({
    environment: options.environment,
    ...config.environments[options.environment]?.context,
    ...parseSetPairs(options.set),
  });
  requireInputs(pipeline, context);

  const store = deps.store ?? openRunStore(config, deps);
  const recorder = new RunRecorder(store, clock);
  const signals: SignalSource = deps.signals ?? process;
  const exit = deps.exit ?? ((code: number) => process.exit(code));
  const cancellation = new CancellationTokenSource();
  const spinner = ora({ isSilent: options.json });

  let interrupts = 0;
  const onInterrupt = () => {
    interrupts += 1;
    if (interrupts === 1) {
      spinner.warn('Interrupt received; stopping before the next step (press Ctrl+C again to abort)');
      cancellation.cancel({ initiator: 'signal', reason: 'interrupted (SIGINT)' });
      return;
    }
    spinner.stop();
    exit(exitCodeFor('CANCELLED'));
  };

  try {
    if (!options.force && !options.dryRun) {
      const active = await recorder.findActiveRun(pipeline.name, options.environment);
      if (active) {
        throw new RunInProgressError(pipeline.name, options.environment, active.runId);
      }
    }

    if (!options.json) {
      const mode = options.dryRun ? chalk.yellow(' [dry run]') : '';
      console.log(chalk.bold(`\n  ${pipeline.name} → ${options.environment}${mode}\n`));
      for (const warning of pipeline.warnings) {
        console.log(chalk.yellow(`  Warning: ${warning.message}`));
      }
    }

    const runner = new PipelineRunner({
      stepTimeoutMs: config.runner.stepTimeoutMs,
      retryCount: config.runner.retryCount,
      retryDelayMs: config.runner.retryDelayMs,
      logger,
      clock,
    });

    signals.on('SIGINT', onInterrupt);
    const observers: RunObserver[] = [recorder];
    if (!options.json) {
      observers.push(new ProgressPrinter(spinner, clock));
    }

    const report = await runner.run(pipeline, context, {
      environment: options.environment,
      dryRun: options.dryRun,
      cancellation: cancellation.getToken(),
      observers,
    });

    if (options.json) {
      console.log(JSON.stringify(toRunReportJson(report), null, 2));
    } else {
      console.log();
      printOutcome(report);
      console.log(chalk.dim(`  Run ID: ${report.runId}`));
    }
    return report;
  } finally {
    signals.off('SIGINT', onInterrupt);
    cancellation.dispose();
    spinner.stop();
    if (!deps.store) {
      await store.close();
    }
  }
}
