/**
 * pipewright CLI
 *
 * Runs sequential deployment pipelines from YAML or JSON definitions.
 *
 * Usage:
 *   pipewright run --pipeline <name> --environment <env> [--set key=value]...
 *   pipewright status [--run-id <id>]
 *   pipewright validate <file>
 *   pipewright pipelines
 *   pipewright config show|get|set
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { toExitCode } from '@pipewright/core';
import {
  configGetCommand,
  configSetCommand,
  configShowCommand,
  type ConfigOptions,
} from './commands/config.js';
import { pipelinesCommand, type PipelinesOptions } from './commands/pipelines.js';
import { runCommand, runExitCode, type RunCommandOptions } from './commands/run.js';
import { statusCommand, type StatusOptions } from './commands/status.js';
import { validateCommand, type ValidateOptions } from './commands/validate.js';

const program = new Command();

program
  .name('pipewright')
  .description('Sequential deployment pipelines with strict halt semantics')
  .version('0.1.0');

function fail(error: unknown): never {
  console.error(chalk.red('Error:'), error instanceof Error ? error.message : String(error));
  process.exit(toExitCode(error));
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function positiveInt(value: string): number {
  const n = Number.parseInt(value, 10);
  if (!Number.isInteger(n) || n <= 0) {
    throw new Error(`Expected a positive integer, got "${value}"`);
  }
  return n;
}

// =============================================================================
// Run
// =============================================================================

program
  .command('run')
  .description('Run a pipeline against an environment')
  .requiredOption('-p, --pipeline <name>', 'Pipeline name (file in the pipelines directory)')
  .requiredOption('-e, --environment <env>', 'Target environment')
  .option('-s, --set <key=value>', 'Seed a context value (repeatable)', collect, [])
  .option('--dry-run', 'Preview mutating steps without applying them')
  .option('--force', 'Start even if another run is recorded as running')
  .option('--json', 'Print the run report as JSON')
  .option('-v, --verbose', 'Log at debug level')
  .action(async (options: RunCommandOptions) => {
    try {
      const report = await runCommand(options);
      process.exit(runExitCode(report));
    } catch (error) {
      fail(error);
    }
  });

// =============================================================================
// Status
// =============================================================================

program
  .command('status')
  .description('Show a run report, or list recent runs')
  .option('-r, --run-id <id>', 'Run to show')
  .option('-p, --pipeline <name>', 'Filter the list by pipeline')
  .option('-e, --environment <env>', 'Filter the list by environment')
  .option('-n, --limit <n>', 'Number of runs to list', positiveInt)
  .option('--json', 'Output as JSON')
  .action(async (options: StatusOptions) => {
    try {
      await statusCommand(options);
    } catch (error) {
      fail(error);
    }
  });

// =============================================================================
// Validate
// =============================================================================

program
  .command('validate')
  .description('Validate a pipeline definition without running it')
  .argument('<file>', 'Definition file (.yaml, .yml or .json)')
  .option('--json', 'Output as JSON')
  .action(async (file: string, options: ValidateOptions) => {
    try {
      await validateCommand(file, options);
    } catch (error) {
      fail(error);
    }
  });

// =============================================================================
// Pipelines
// =============================================================================

program
  .command('pipelines')
  .description('List pipelines in the configured directory')
  .option('--json', 'Output as JSON')
  .action(async (options: PipelinesOptions) => {
    try {
      await pipelinesCommand(options);
    } catch (error) {
      fail(error);
    }
  });

// =============================================================================
// Config
// =============================================================================

const configCmd = program.command('config').description('Manage configuration');

configCmd
  .command('show')
  .description('Show the merged configuration')
  .option('--json', 'Output as JSON')
  .action(async (options: ConfigOptions) => {
    try {
      await configShowCommand(options);
    } catch (error) {
      fail(error);
    }
  });

configCmd
  .command('get')
  .description('Print one value (e.g. runner.retryCount)')
  .argument('<key>', 'Dotted key')
  .option('--json', 'Output as JSON')
  .action(async (key: string, options: ConfigOptions) => {
    try {
      await configGetCommand(key, options);
    } catch (error) {
      fail(error);
    }
  });

configCmd
  .command('set')
  .description('Set a value in the project config, or the global one with --global')
  .argument('<key>', 'Dotted key')
  .argument('<value>', 'New value')
  .option('-g, --global', 'Write ~/.pipewright/config.json')
  .action(async (key: string, value: string, options: ConfigOptions) => {
    try {
      await configSetCommand(key, value, options);
    } catch (error) {
      fail(error);
    }
  });

await program.parseAsync();
