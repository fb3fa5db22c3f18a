/**
 * Terraform Tool Tests
 */

import { describe, it, expect } from 'vitest';
import { TerraformTool, parsePlanOutput } from '../terraform.js';
import { FakeCommandRunner } from './fake-runner.js';

describe('parsePlanOutput', () => {
  it('sums added, changed and destroyed resources', () => {
    expect(parsePlanOutput('...\nPlan: 1 to add, 2 to change, 3 to destroy.\n')).toEqual({
      changes: 6,
      summary: 'Plan: 1 to add, 2 to change, 3 to destroy',
    });
  });

  it('recognizes an empty plan', () => {
    expect(parsePlanOutput('No changes. Your infrastructure matches the configuration.')).toEqual({
      changes: 0,
      summary: 'No changes',
    });
  });

  it('leaves the change count unknown otherwise', () => {
    expect(parsePlanOutput('Warning: something unexpected')).toEqual({
      changes: null,
      summary: 'Plan produced no summary',
    });
  });
});

describe('TerraformTool', () => {
  it('validates formatting and configuration', async () => {
    const runner = new FakeCommandRunner()
      .reply('terraform fmt', { exitCode: 3, stdout: 'main.tf\nvariables.tf\n' })
      .reply('terraform validate', { exitCode: 1, stderr: 'Error: Unsupported argument\n' });

    const result = await new TerraformTool(runner).validate('/srv/infra');

    expect(result).toEqual({
      valid: false,
      diagnostics: ['Not formatted: main.tf, variables.tf', 'Error: Unsupported argument'],
    });
    expect(runner.commandLines()).toEqual([
      'terraform fmt -check -recursive',
      'terraform init -backend=false -input=false',
      'terraform validate -no-color',
    ]);
    expect(runner.calls.every((c) => c.options.cwd === '/srv/infra')).toBe(true);
    expect(runner.calls[0].options.env).toEqual({ TF_IN_AUTOMATION: '1' });
  });

  it('plans with variables', async () => {
    const runner = new FakeCommandRunner().reply('terraform plan', {
      stdout: 'Plan: 1 to add, 0 to change, 0 to destroy.\n',
    });

    const plan = await new TerraformTool(runner).plan('/srv/infra', { environment: 'staging', region: 'eu-west-1' });

    expect(plan).toEqual({ changes: 1, summary: 'Plan: 1 to add, 0 to change, 0 to destroy' });
    expect(runner.commandLines()).toEqual([
      'terraform init -input=false',
      'terraform plan -input=false -no-color -var environment=staging -var region=eu-west-1',
    ]);
  });

  it('applies and returns the completion line', async () => {
    const runner = new FakeCommandRunner().reply('tofu apply', {
      stdout: 'aws_s3_bucket.assets: Creating...\nApply complete! Resources: 1 added, 0 changed, 0 destroyed.\n',
    });

    const result = await new TerraformTool(runner, { binary: 'tofu' }).apply('/srv/infra', {});

    expect(result).toEqual({ summary: 'Apply complete! Resources: 1 added, 0 changed, 0 destroyed.' });
    expect(runner.commandLines()).toEqual([
      'tofu init -input=false',
      'tofu apply -input=false -auto-approve -no-color',
    ]);
  });
});
