/**
 * kubectl Orchestration Plane Tests
 */

import { describe, it, expect } from 'vitest';
import { KubectlPlane } from '../kubectl.js';
import { FakeCommandRunner } from './fake-runner.js';

describe('KubectlPlane', () => {
  it('validates each manifest client-side and collects failures', async () => {
    const runner = new FakeCommandRunner().reply('kubectl apply --dry-run=client -f k8s/bad.yaml', {
      exitCode: 1,
      stderr: 'error: error validating "k8s/bad.yaml"\n',
    });
    const plane = new KubectlPlane(runner);

    const violations = await plane.validateManifests(['k8s/good.yaml', 'k8s/bad.yaml']);

    expect(violations).toEqual(['Invalid manifest k8s/bad.yaml: error: error validating "k8s/bad.yaml"']);
    expect(runner.calls).toHaveLength(2);
  });

  it('applies manifests and returns one line per resource', async () => {
    const runner = new FakeCommandRunner().reply('kubectl apply', {
      stdout: 'deployment.apps/web configured\nservice/web unchanged\n',
    });
    const plane = new KubectlPlane(runner);

    const lines = await plane.applyManifests(['a.yaml', 'b.yaml'], 'staging', { dryRun: true });

    expect(lines).toEqual(['deployment.apps/web configured', 'service/web unchanged']);
    expect(runner.commandLines()).toEqual(['kubectl apply --namespace staging --dry-run=server -f a.yaml -f b.yaml']);
  });

  it('targets the configured context and binary', async () => {
    const runner = new FakeCommandRunner();
    const plane = new KubectlPlane(runner, { binary: '/usr/local/bin/kubectl', context: 'prod-eu', cwd: '/srv/app' });

    await plane.scale('deployment/web', 'production', 4);

    expect(runner.commandLines()).toEqual([
      '/usr/local/bin/kubectl --context prod-eu scale deployment/web --namespace production --replicas=4',
    ]);
    expect(runner.calls[0].options.cwd).toBe('/srv/app');
  });

  it('reports rollout readiness', async () => {
    const runner = new FakeCommandRunner().reply('kubectl rollout status', {
      stdout: 'deployment "web" successfully rolled out\n',
    });

    const status = await new KubectlPlane(runner).rolloutStatus('deployment/web', 'staging', 120);

    expect(status).toEqual({ ready: true, message: 'deployment "web" successfully rolled out' });
    expect(runner.commandLines()).toEqual([
      'kubectl rollout status deployment/web --namespace staging --timeout=120s',
    ]);
  });

  it('reports a rollout that does not finish', async () => {
    const runner = new FakeCommandRunner().reply('kubectl rollout status', {
      exitCode: 1,
      stderr: 'error: timed out waiting for the condition\n',
    });

    const status = await new KubectlPlane(runner).rolloutStatus('deployment/web', 'staging', 5);

    expect(status).toEqual({ ready: false, message: 'error: timed out waiting for the condition' });
  });

  it('reads replicas', async () => {
    const runner = new FakeCommandRunner().reply('kubectl get', { stdout: '3' });

    await expect(new KubectlPlane(runner).getReplicas('deployment/web', 'staging')).resolves.toBe(3);
    expect(runner.calls[0].args).toEqual([
      'get',
      'deployment/web',
      '--namespace',
      'staging',
      '-o',
      'jsonpath={.spec.replicas}',
    ]);
  });

  it('rejects unreadable replica counts', async () => {
    const runner = new FakeCommandRunner().reply('kubectl get', { stdout: '' });

    await expect(new KubectlPlane(runner).getReplicas('deployment/web', 'staging')).rejects.toMatchObject({
      message: 'Could not read replicas of deployment/web: ""',
      code: 'EXTERNAL_CALL_FAILURE',
    });
  });

  it('propagates apply failures', async () => {
    const runner = new FakeCommandRunner().reply('kubectl apply', { exitCode: 1, stderr: 'forbidden' });

    await expect(new KubectlPlane(runner).applyManifests(['a.yaml'], 'staging')).rejects.toMatchObject({
      code: 'EXTERNAL_CALL_FAILURE',
      retryable: true,
    });
  });
});
