/**
 * Pipeline Definitions
 *
 * Static pipeline files (YAML or JSON, one pipeline per file) and their
 * parsing. A definition names steps and the catalog entry each one `uses`;
 * `buildPipeline` turns it into an executable Pipeline.
 *
 * @module @pipewright/engine/pipeline/definition
 */

import { promises as fs } from 'node:fs';
import { basename, extname, join } from 'node:path';
import { z } from 'zod';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import { PipelineDefinitionError } from '@pipewright/core';
import { ContextValueSchema } from '../context/execution-context.js';

// =============================================================================
// Schema
// =============================================================================

const Identifier = z
  .string()
  .min(1)
  .regex(/^[a-z0-9][a-z0-9._-]*$/i, 'Must be alphanumeric with . _ or -');

export const StepDefinition = z
  .object({
    name: Identifier,
    /** Catalog id, e.g. `vcs.inspect-pull-request` */
    uses: z.string().min(1),
    description: z.string().optional(),
    /** Factory params; strings may hold `${key}` placeholders */
    with: z.record(z.string(), ContextValueSchema).default({}),
    retryable: z.boolean().optional(),
    timeoutSeconds: z.number().positive().optional(),
  })
  .strict();
export type StepDefinition = z.infer<typeof StepDefinition>;

export const PipelineDefinition = z
  .object({
    name: Identifier,
    description: z.string().optional(),
    /** Keys the caller seeds into the context */
    inputs: z.array(z.string().min(1)).default([]),
    steps: z.array(StepDefinition).min(1, 'Pipeline must have at least one step'),
  })
  .strict();
export type PipelineDefinition = z.infer<typeof PipelineDefinition>;

export type DefinitionFormat = 'json' | 'yaml';

export interface ParsedDefinition {
  definition: PipelineDefinition;
  format: DefinitionFormat;
}

/** File extensions searched in the pipelines directory */
export const DEFINITION_EXTENSIONS = ['.yaml', '.yml', '.json'] as const;

// =============================================================================
// Parsing
// =============================================================================

/**
 * Detect the format of a definition string
 */
export function detectFormat(input: string): DefinitionFormat {
  const trimmed = input.trim();
  return trimmed.startsWith('{') || trimmed.startsWith('[') ? 'json' : 'yaml';
}

/**
 * Parse and validate a definition
 *
 * @throws {PipelineDefinitionError} On syntax or shape errors
 *
 * @example
 * ```typescript
 * const { definition } = parsePipelineDefinition(`
 * name: deploy
 * inputs: [image]
 * steps:
 *   - name: apply
 *     uses: k8s.apply
 *     with: { manifests: [k8s/deployment.yaml] }
 * `);
 * ```
 */
export function parsePipelineDefinition(input: string, options: { source?: string } = {}): ParsedDefinition {
  const format = detectFormat(input);

  let raw: unknown;
  try {
    raw = format === 'json' ? JSON.parse(input) : parseYaml(input);
  } catch (err) {
    const cause = err instanceof Error ? err : undefined;
    throw new PipelineDefinitionError(
      `Failed to parse ${format}${options.source ? ` in ${options.source}` : ''}: ${cause?.message ?? String(err)}`,
      [],
      { source: options.source, cause }
    );
  }

  const result = PipelineDefinition.safeParse(raw);
  if (!result.success) {
    const problems = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new PipelineDefinitionError(
      `Invalid pipeline definition${options.source ? ` in ${options.source}` : ''}`,
      problems,
      { source: options.source }
    );
  }

  return { definition: result.data, format };
}

/**
 * Serialize a definition
 */
export function serializePipelineDefinition(definition: PipelineDefinition, format: DefinitionFormat = 'yaml'): string {
  return format === 'json' ? `${JSON.stringify(definition, null, 2)}\n` : stringifyYaml(definition);
}

// =============================================================================
// Files
// =============================================================================

/**
 * Read and parse a definition file
 */
export async function loadPipelineFile(path: string): Promise<ParsedDefinition> {
  let content: string;
  try {
    content = await fs.readFile(path, 'utf-8');
  } catch (err) {
    throw new PipelineDefinitionError(`Cannot read pipeline file ${path}`, [], {
      source: path,
      cause: err instanceof Error ? err : undefined,
    });
  }
  return parsePipelineDefinition(content, { source: path });
}

export interface PipelineFileEntry {
  /** File name without extension */
  name: string;
  path: string;
}

/**
 * Definition files in a directory, sorted by name
 */
export async function listPipelineFiles(directory: string): Promise<PipelineFileEntry[]> {
  let files: string[];
  try {
    files = await fs.readdir(directory);
  } catch (err) {
    if (typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT') {
      return [];
    }
    throw new PipelineDefinitionError(`Cannot read pipelines directory ${directory}`, [], {
      source: directory,
      cause: err instanceof Error ? err : undefined,
    });
  }

  return files
    .filter((file) => DEFINITION_EXTENSIONS.some((ext) => ext === extname(file)))
    .map((file) => ({ name: basename(file, extname(file)), path: join(directory, file) }))
    .sort((a, b) => a.name.localeCompare(b.name));
}

/**
 * Find `<directory>/<name>.yaml|.yml|.json` and load it
 *
 * @throws {PipelineDefinitionError} If no file exists or it is invalid
 */
export async function findPipelineDefinition(directory: string, name: string): Promise<ParsedDefinition & { path: string }> {
  const entries = await listPipelineFiles(directory);
  const entry = entries.find((e) => e.name === name);
  if (!entry) {
    const known = entries.map((e) => e.name);
    throw new PipelineDefinitionError(
      `Pipeline "${name}" not found in ${directory}${known.length > 0 ? ` (available: ${known.join(', ')})` : ''}`
    );
  }
  const parsed = await loadPipelineFile(entry.path);
  return { ...parsed, path: entry.path };
}
