/**
 * Validate Command
 *
 * Parses a pipeline definition, resolves its steps against the built-in
 * catalog and reports errors, warnings and the execution order. Nothing runs.
 */

import { resolve } from 'node:path';
import chalk from 'chalk';
import { PipelineDefinitionError } from '@pipewright/core';
import { buildPipeline, createBuiltinCatalog, loadPipelineFile, type Pipeline } from '@pipewright/engine';
import {
  createCommandLogger,
  createStepServices,
  loadCommandConfig,
  projectDir,
  type CommandEnvironment,
} from '../services.js';

export interface ValidateOptions {
  json?: boolean;
}

/**
 * Execute the validate command
 *
 * @throws {PipelineDefinitionError} If the definition is invalid
 */
export async function validateCommand(
  file: string,
  options: ValidateOptions = {},
  deps: CommandEnvironment = {}
): Promise<Pipeline> {
  const path = resolve(projectDir(deps), file);
  const config = loadCommandConfig(deps);
  const services = createStepServices(config, createCommandLogger(false, deps), deps);

  let pipeline: Pipeline;
  try {
    const { definition } = await loadPipelineFile(path);
    pipeline = buildPipeline(definition, createBuiltinCatalog(services), { source: path });
  } catch (err) {
    if (options.json && err instanceof PipelineDefinitionError) {
      const problems = err.problems.length > 0 ? err.problems : [err.message];
      console.log(JSON.stringify({ valid: false, source: path, problems }, null, 2));
    }
    throw err;
  }

  if (options.json) {
    console.log(
      JSON.stringify(
        {
          valid: true,
          source: path,
          name: pipeline.name,
          inputs: pipeline.inputs,
          steps: pipeline.steps.map((s) => ({ name: s.name, kind: s.kind, requires: s.requires, produces: s.produces })),
          warnings: pipeline.warnings.map((w) => w.message),
        },
        null,
        2
      )
    );
    return pipeline;
  }

  console.log(chalk.green(`✓ Pipeline "${pipeline.name}" is valid`));
  if (pipeline.inputs.length > 0) {
    console.log(chalk.dim(`  Inputs: ${pipeline.inputs.join(', ')}`));
  }
  for (const warning of pipeline.warnings) {
    console.log(chalk.yellow(`  Warning: ${warning.message}`));
  }
  console.log(chalk.bold('  Steps:'));
  for (const [index, step] of pipeline.steps.entries()) {
    console.log(`    ${index + 1}. ${step.name} ${chalk.dim(`(${step.kind})`)}`);
  }
  return pipeline;
}
