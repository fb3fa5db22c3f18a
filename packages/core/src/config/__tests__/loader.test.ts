/**
 * Configuration Loader Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  loadConfig,
  setConfigValue,
  getConfigValue,
  getConfigPath,
  expandPath,
  validateConfig,
} from '../loader.js';
import { defaultConfig } from '../schema.js';
import { ConfigurationError } from '../../reliability/errors.js';

describe('config loader', () => {
  let root: string;
  let homeDir: string;
  let cwd: string;

  const writeJson = (path: string, value: unknown) => {
    mkdirSync(join(path, '..'), { recursive: true });
    writeFileSync(path, JSON.stringify(value));
  };

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'pipewright-config-'));
    homeDir = join(root, 'home');
    cwd = join(root, 'project');
    mkdirSync(homeDir, { recursive: true });
    mkdirSync(cwd, { recursive: true });
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('returns defaults when nothing is configured', () => {
    const { config, sources } = loadConfig({ homeDir, cwd, env: {} });

    expect(sources).toEqual([]);
    expect(config).toEqual(defaultConfig());
    expect(config.runner).toEqual({ stepTimeoutMs: 300000, retryCount: 1, retryDelayMs: 2000 });
    expect(config.storage).toEqual({ backend: 'sqlite', path: '~/.pipewright/runs.db' });
    expect(config.pipelines.directory).toBe('pipelines');
  });

  it('layers project config over global config', () => {
    writeJson(getConfigPath('global', { homeDir }), {
      runner: { retryCount: 3, retryDelayMs: 500 },
      pipelines: { directory: '/etc/pipelines' },
    });
    writeJson(getConfigPath('project', { cwd }), {
      runner: { retryCount: 0 },
      environments: { staging: { context: { namespace: 'web-staging' } } },
    });

    const { config, sources } = loadConfig({ homeDir, cwd, env: {} });

    expect(sources).toHaveLength(2);
    expect(config.runner.retryCount).toBe(0);
    expect(config.runner.retryDelayMs).toBe(500);
    expect(config.pipelines.directory).toBe('/etc/pipelines');
    expect(config.environments.staging.context).toEqual({ namespace: 'web-staging' });
  });

  it('applies environment variables last', () => {
    writeJson(getConfigPath('project', { cwd }), { storage: { backend: 'sqlite' } });

    const { config } = loadConfig({
      homeDir,
      cwd,
      env: {
        PIPEWRIGHT_STORAGE: 'memory',
        PIPEWRIGHT_STEP_TIMEOUT_MS: '1500',
        GITHUB_TOKEN: 'test-token',
        PIPEWRIGHT_WEBHOOK_URL: 'https://hooks.example.test/deploys',
      },
    });

    expect(config.storage.backend).toBe('memory');
    expect(config.runner.stepTimeoutMs).toBe(1500);
    expect(config.github.token).toBe('test-token');
    expect(config.notifications.webhookUrl).toBe('https://hooks.example.test/deploys');
  });

  it('rejects invalid values with field errors', () => {
    writeJson(getConfigPath('project', { cwd }), { runner: { retryCount: -1 } });

    try {
      loadConfig({ homeDir, cwd, env: {} });
      expect.unreachable('loadConfig should throw');
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigurationError);
      if (err instanceof ConfigurationError) {
        expect(Object.keys(err.fieldErrors ?? {})).toEqual(['runner.retryCount']);
      }
    }
  });

  it('rejects a file that is not JSON', () => {
    const path = getConfigPath('global', { homeDir });
    mkdirSync(join(path, '..'), { recursive: true });
    writeFileSync(path, '{ not json');

    expect(() => loadConfig({ homeDir, cwd, env: {} })).toThrow(ConfigurationError);
  });

  it('rejects an unknown storage backend', () => {
    expect(() => validateConfig({ storage: { backend: 'postgres' } })).toThrow(/storage\.backend/);
  });

  describe('setConfigValue', () => {
    it('coerces numbers and writes the project file', () => {
      const config = setConfigValue('project', 'runner.retryCount', '2', { cwd });

      expect(config.runner.retryCount).toBe(2);
      const written = JSON.parse(readFileSync(getConfigPath('project', { cwd }), 'utf-8'));
      expect(written).toEqual({ runner: { retryCount: 2 } });
    });

    it('keeps strings as strings', () => {
      setConfigValue('global', 'storage.backend', 'memory', { homeDir });
      const { config } = loadConfig({ homeDir, cwd, env: {} });
      expect(config.storage.backend).toBe('memory');
    });

    it('refuses a non-numeric value for a numeric key', () => {
      expect(() => setConfigValue('project', 'runner.retryDelayMs', 'soon', { cwd })).toThrow(
        'Value must be a number for runner.retryDelayMs'
      );
    });

    it('refuses a key without a section', () => {
      expect(() => setConfigValue('project', 'retryCount', '1', { cwd })).toThrow(/Invalid key format/);
    });

    it('does not write a value that fails validation', () => {
      expect(() => setConfigValue('project', 'storage.backend', 'postgres', { cwd })).toThrow(ConfigurationError);
      expect(() => readFileSync(getConfigPath('project', { cwd }), 'utf-8')).toThrow();
    });
  });

  it('getConfigValue reads dotted keys', () => {
    const config = defaultConfig();
    expect(getConfigValue(config, 'runner.retryDelayMs')).toBe(2000);
    expect(getConfigValue(config, 'runner.nope')).toBeUndefined();
  });

  it('expandPath resolves a leading tilde', () => {
    expect(expandPath('~/.pipewright/runs.db', '/home/ci')).toBe('/home/ci/.pipewright/runs.db');
    expect(expandPath('/var/lib/runs.db', '/home/ci')).toBe('/var/lib/runs.db');
  });
});
