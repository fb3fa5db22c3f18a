/**
 * File steps: write rendered configuration files and check .env files for
 * required keys.
 *
 * @module @pipewright/engine/catalog/builtins/files
 */

import { createHash } from 'node:crypto';
import { promises as fs } from 'node:fs';
import { dirname } from 'node:path';
import { pathToFileURL } from 'node:url';
import { z } from 'zod';
import { PipelineDefinitionError } from '@pipewright/core';
import { artifactRef } from '../../context/execution-context.js';
import { hasPlaceholders } from '../../pipeline/template.js';
import { mutatingStep, validationStep } from '../../step-contract/factories.js';
import type { StepContext } from '../../step-contract/types.js';
import { defineStep, type StepFactory, type StepServices } from '../types.js';
import { resolveWorkPath } from './shared.js';

function sha256(content: string): string {
  return createHash('sha256').update(content).digest('hex');
}

async function readIfExists(path: string): Promise<string | null> {
  try {
    return await fs.readFile(path, 'utf-8');
  } catch (err) {
    if (typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT') {
      return null;
    }
    throw err;
  }
}

/**
 * KEY=value pairs of a dotenv file; comments, blank lines and `export ` are allowed
 */
export function parseEnvFile(content: string): Map<string, string> {
  const entries = new Map<string, string>();
  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line.length === 0 || line.startsWith('#')) continue;

    const match = line.replace(/^export\s+/, '').match(/^([A-Za-z_][A-Za-z0-9_]*)\s*=\s*(.*)$/);
    if (!match) continue;
    entries.set(match[1], match[2].replace(/^(['"])(.*)\1$/, '$2'));
  }
  return entries;
}

export function fileSteps(services: StepServices): StepFactory[] {
  const writeFile = defineStep({
    id: 'files.write',
    kind: 'mutating',
    summary: 'Write a file from rendered content; records an artifact reference under `output`',
    params: z
      .object({
        path: z.string().min(1),
        content: z.string(),
        /** Context key for the artifact reference */
        output: z.string().min(1).optional(),
      })
      .strict(),
    build: ({ name, description, raw, params }) => {
      const output = typeof raw.output === 'string' ? raw.output : undefined;
      if ((raw.output !== undefined && output === undefined) || (output !== undefined && hasPlaceholders(output))) {
        throw new PipelineDefinitionError(`Invalid params for step "${name}"`, [
          'output: must be a literal context key',
        ]);
      }

      const record = (ctx: StepContext, path: string, content: string) => {
        if (output) {
          ctx.set(output, artifactRef(pathToFileURL(path).href, { sha256: sha256(content) }));
        }
      };

      return mutatingStep({
        name,
        description,
        produces: output ? [output] : [],
        probe: async (ctx) => {
          const { path, content } = params(ctx);
          const target = resolveWorkPath(services.workdir, path);
          if ((await readIfExists(target)) === content) {
            record(ctx, target, content);
            return { applied: true, message: `${path} already up to date` };
          }
          return { applied: false };
        },
        preview: async (ctx) => {
          const { path, content } = params(ctx);
          record(ctx, resolveWorkPath(services.workdir, path), content);
          return `Dry run: would write ${path} (${Buffer.byteLength(content)} bytes)`;
        },
        apply: async (ctx) => {
          const { path, content } = params(ctx);
          const target = resolveWorkPath(services.workdir, path);
          await fs.mkdir(dirname(target), { recursive: true });
          await fs.writeFile(target, content, 'utf-8');
          record(ctx, target, content);
          return `Wrote ${path} (${Buffer.byteLength(content)} bytes)`;
        },
      });
    },
  });

  const requireEnvKeys = defineStep({
    id: 'files.require-env-keys',
    kind: 'validation',
    summary: 'Fail unless a .env file defines every listed key with a value',
    params: z
      .object({
        path: z.string().min(1),
        keys: z.array(z.string().min(1)).min(1),
      })
      .strict(),
    build: ({ name, description, params }) =>
      validationStep({
        name,
        description,
        // An earlier files.write only previews in a dry run
        skipInDryRun: true,
        check: async (ctx) => {
          const { path, keys } = params(ctx);
          const content = await readIfExists(resolveWorkPath(services.workdir, path));
          if (content === null) {
            return [`${path} does not exist`];
          }

          const entries = parseEnvFile(content);
          return keys
            .filter((key) => !entries.get(key))
            .map((key) => (entries.has(key) ? `${key} is empty in ${path}` : `${key} is missing from ${path}`));
        },
      }),
  });

  return [writeFile, requireEnvKeys];
}
