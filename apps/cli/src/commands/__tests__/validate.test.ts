/**
 * Tests for pipewright validate and pipewright pipelines
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { PipelineDefinitionError } from '@pipewright/core';
import { listPipelines, pipelinesCommand } from '../pipelines.js';
import { validateCommand } from '../validate.js';
import { RELEASE_PIPELINE, createTestProject, type TestProject } from './project.js';

describe('Validate Command', () => {
  let project: TestProject;
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;

  function printed(): unknown {
    return JSON.parse(String(consoleLogSpy.mock.calls[0][0]));
  }

  beforeEach(() => {
    project = createTestProject();
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    project.cleanup();
  });

  it('reports the steps of a valid pipeline in execution order', async () => {
    const path = project.writePipeline('release.yaml', RELEASE_PIPELINE);

    const pipeline = await validateCommand('pipelines/release.yaml', { json: true }, project.env);

    expect(pipeline.steps.map((s) => s.name)).toEqual(['write-config', 'check-config', 'announce']);
    expect(printed()).toEqual({
      valid: true,
      source: path,
      name: 'release',
      inputs: ['environment', 'image', 'region'],
      steps: [
        { name: 'write-config', kind: 'mutating', requires: ['environment', 'image', 'region'], produces: [] },
        { name: 'check-config', kind: 'validation', requires: ['environment'], produces: [] },
        { name: 'announce', kind: 'notify', requires: ['image', 'environment'], produces: [] },
      ],
      warnings: [],
    });
  });

  it('prints a checkmark and the numbered steps', async () => {
    project.writePipeline('release.yaml', RELEASE_PIPELINE);

    await validateCommand('pipelines/release.yaml', {}, project.env);

    expect(consoleLogSpy).toHaveBeenCalledWith(expect.stringContaining('Pipeline "release" is valid'));
    expect(consoleLogSpy).toHaveBeenCalledWith(expect.stringContaining('1. write-config'));
    expect(consoleLogSpy).toHaveBeenCalledWith(expect.stringContaining('3. announce'));
  });

  it('throws every problem and prints them with --json', async () => {
    const path = project.writePipeline(
      'broken.yaml',
      `
name: broken
steps:
  - name: announce
    uses: notify.post
    with: { message: "Deployed \${image}" }
  - name: scale
    uses: k8s.scale
    with: { resource: deployment/web, replicas: -1 }
`
    );

    const error = await validateCommand('pipelines/broken.yaml', { json: true }, project.env).catch(
      (err: unknown) => err
    );

    expect(error).toBeInstanceOf(PipelineDefinitionError);
    expect(printed()).toEqual({
      valid: false,
      source: path,
      problems: ['Step "scale" (k8s.scale): replicas: Number must be greater than or equal to 0'],
    });
  });

  it('reports a file that is not valid YAML', async () => {
    project.writePipeline('bad.yaml', 'name: [unclosed\n');

    await expect(validateCommand('pipelines/bad.yaml', {}, project.env)).rejects.toMatchObject({
      code: 'DEFINITION_ERROR',
    });
  });
});

describe('Pipelines Command', () => {
  let project: TestProject;
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    project = createTestProject();
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    project.cleanup();
  });

  it('lists definitions sorted by file name, including invalid ones', async () => {
    const releasePath = project.writePipeline('release.yaml', RELEASE_PIPELINE);
    const emptyPath = project.writePipeline('empty.yaml', 'name: empty\nsteps: []\n');
    project.writePipeline('README.md', '# not a pipeline');

    expect(await listPipelines(project.env)).toEqual([
      {
        name: 'empty',
        path: emptyPath,
        valid: false,
        error: `Invalid pipeline definition in ${emptyPath}:`,
      },
      {
        name: 'release',
        path: releasePath,
        valid: true,
        description: 'Write the release config and announce it',
        inputs: ['environment', 'image', 'region'],
        stepCount: 3,
      },
    ]);
  });

  it('follows pipelines.directory from config', async () => {
    project.writeConfig({ pipelines: { directory: 'deploy/pipelines' } });

    await pipelinesCommand({}, project.env);

    expect(consoleLogSpy).toHaveBeenCalledWith(expect.stringContaining('No pipelines found in'));
    expect(consoleLogSpy).toHaveBeenCalledWith(expect.stringContaining('deploy/pipelines'));
  });
});
