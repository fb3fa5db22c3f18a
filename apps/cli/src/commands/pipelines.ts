/**
 * Pipelines Command
 *
 * Lists the definitions in the configured pipelines directory.
 */

import chalk from 'chalk';
import { listPipelineFiles, loadPipelineFile } from '@pipewright/engine';
import { loadCommandConfig, pipelinesDir, type CommandEnvironment } from '../services.js';

export interface PipelinesOptions {
  json?: boolean;
}

export interface PipelineSummary {
  name: string;
  path: string;
  valid: boolean;
  description?: string;
  inputs?: string[];
  stepCount?: number;
  error?: string;
}

/**
 * Summaries of every definition file; files that fail to parse are listed as invalid
 */
export async function listPipelines(deps: CommandEnvironment = {}): Promise<PipelineSummary[]> {
  const directory = pipelinesDir(loadCommandConfig(deps), deps);
  const summaries: PipelineSummary[] = [];

  for (const entry of await listPipelineFiles(directory)) {
    try {
      const { definition } = await loadPipelineFile(entry.path);
      summaries.push({
        name: definition.name,
        path: entry.path,
        valid: true,
        description: definition.description,
        inputs: definition.inputs,
        stepCount: definition.steps.length,
      });
    } catch (err) {
      summaries.push({
        name: entry.name,
        path: entry.path,
        valid: false,
        error: err instanceof Error ? err.message.split('\n')[0] : String(err),
      });
    }
  }
  return summaries;
}

/**
 * Execute the pipelines command
 */
export async function pipelinesCommand(options: PipelinesOptions = {}, deps: CommandEnvironment = {}): Promise<void> {
  const summaries = await listPipelines(deps);

  if (options.json) {
    console.log(JSON.stringify(summaries, null, 2));
    return;
  }

  if (summaries.length === 0) {
    console.log(chalk.dim(`No pipelines found in ${pipelinesDir(loadCommandConfig(deps), deps)}`));
    return;
  }

  for (const summary of summaries) {
    if (!summary.valid) {
      console.log(`  ${chalk.red('✗')} ${summary.name} ${chalk.red(`(invalid: ${summary.error})`)}`);
      continue;
    }
    const inputs = summary.inputs && summary.inputs.length > 0 ? `  inputs: ${summary.inputs.join(', ')}` : '';
    console.log(`  ${chalk.green('●')} ${chalk.bold(summary.name)} ${chalk.dim(`${summary.stepCount} steps${inputs}`)}`);
    if (summary.description) {
      console.log(chalk.dim(`      ${summary.description}`));
    }
  }
}
