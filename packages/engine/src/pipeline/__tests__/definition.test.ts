/**
 * Pipeline Definition Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { PipelineDefinitionError } from '@pipewright/core';
import {
  detectFormat,
  findPipelineDefinition,
  listPipelineFiles,
  parsePipelineDefinition,
  serializePipelineDefinition,
} from '../definition.js';

const REVERT_YAML = `
name: revert-and-redeploy
description: Revert a merged pull request
inputs: [repository, pullRequestNumber]
steps:
  - name: inspect
    uses: vcs.inspect-pull-request
  - name: announce
    uses: notify.post
    with:
      message: "Reverting #\${pullRequestNumber}"
    timeoutSeconds: 30
`;

describe('parsePipelineDefinition', () => {
  it('parses YAML and applies defaults', () => {
    const { definition, format } = parsePipelineDefinition(REVERT_YAML);

    expect(format).toBe('yaml');
    expect(definition.name).toBe('revert-and-redeploy');
    expect(definition.inputs).toEqual(['repository', 'pullRequestNumber']);
    expect(definition.steps[0]).toEqual({ name: 'inspect', uses: 'vcs.inspect-pull-request', with: {} });
    expect(definition.steps[1].with).toEqual({ message: 'Reverting #${pullRequestNumber}' });
    expect(definition.steps[1].timeoutSeconds).toBe(30);
  });

  it('parses JSON', () => {
    const { definition, format } = parsePipelineDefinition(
      JSON.stringify({ name: 'scale', steps: [{ name: 'up', uses: 'k8s.scale', with: { replicas: 2 } }] })
    );

    expect(format).toBe('json');
    expect(definition.inputs).toEqual([]);
    expect(definition.steps[0].with).toEqual({ replicas: 2 });
  });

  it('round-trips through YAML and JSON serialization', () => {
    const { definition } = parsePipelineDefinition(REVERT_YAML);

    expect(parsePipelineDefinition(serializePipelineDefinition(definition)).definition).toEqual(definition);
    expect(parsePipelineDefinition(serializePipelineDefinition(definition, 'json')).definition).toEqual(definition);
  });

  it('reports syntax errors with the source', () => {
    expect(() => parsePipelineDefinition('{"name": ', { source: 'bad.json' })).toThrow(/^Failed to parse json in bad\.json/);
  });

  it('reports every shape problem', () => {
    try {
      parsePipelineDefinition('name: x\nsteps:\n  - name: a\n    unknownField: 1\n');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(PipelineDefinitionError);
      if (err instanceof PipelineDefinitionError) {
        expect(err.problems).toHaveLength(2);
        expect(err.problems.some((p) => p.startsWith('steps.0.uses:'))).toBe(true);
        expect(err.problems.some((p) => p.startsWith('steps.0:') && p.includes('unknownField'))).toBe(true);
      }
    }
  });

  it('rejects a pipeline without steps', () => {
    expect(() => parsePipelineDefinition('name: x\nsteps: []\n')).toThrow('Pipeline must have at least one step');
  });
});

describe('detectFormat', () => {
  it('treats leading braces as JSON', () => {
    expect(detectFormat('  {"a":1}')).toBe('json');
    expect(detectFormat('name: a')).toBe('yaml');
  });
});

describe('pipeline files', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'pipewright-defs-'));
    await writeFile(join(dir, 'revert.yaml'), REVERT_YAML.replace('revert-and-redeploy', 'revert'));
    await writeFile(join(dir, 'deploy.json'), JSON.stringify({ name: 'deploy', steps: [{ name: 'a', uses: 'x' }] }));
    await writeFile(join(dir, 'notes.txt'), 'not a pipeline');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('lists definition files by name', async () => {
    const entries = await listPipelineFiles(dir);
    expect(entries.map((e) => e.name)).toEqual(['deploy', 'revert']);
  });

  it('returns an empty list for a missing directory', async () => {
    expect(await listPipelineFiles(join(dir, 'absent'))).toEqual([]);
  });

  it('finds a pipeline by name', async () => {
    const found = await findPipelineDefinition(dir, 'revert');
    expect(found.definition.name).toBe('revert');
    expect(found.path).toBe(join(dir, 'revert.yaml'));
  });

  it('names the available pipelines when one is missing', async () => {
    await expect(findPipelineDefinition(dir, 'rollback')).rejects.toThrow(
      `Pipeline "rollback" not found in ${dir} (available: deploy, revert)`
    );
  });
});
