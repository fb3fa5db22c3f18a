/**
 * Configuration Loader
 *
 * Layers, lowest precedence first:
 *   defaults → ~/.pipewright/config.json → ./.pipewright/config.json → environment
 *
 * @module @pipewright/core/config/loader
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { dirname, join } from 'node:path';
import type { ZodError } from 'zod';
import { ConfigurationError } from '../reliability/errors.js';
import { PipewrightConfig } from './schema.js';

export type ConfigScope = 'global' | 'project';

export interface ConfigLocation {
  /** Working directory for the project config (default: process.cwd()) */
  cwd?: string;
  /** Home directory for the global config (default: os.homedir()) */
  homeDir?: string;
}

export interface LoadConfigOptions extends ConfigLocation {
  /** Environment variables (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

export interface LoadedConfig {
  config: PipewrightConfig;
  /** Config files that were found and merged */
  sources: string[];
}

type RawConfig = Record<string, unknown>;

// =============================================================================
// Paths
// =============================================================================

/**
 * Get config file path
 */
export function getConfigPath(scope: ConfigScope, location: ConfigLocation = {}): string {
  if (scope === 'global') {
    return join(location.homeDir ?? homedir(), '.pipewright', 'config.json');
  }
  return join(location.cwd ?? process.cwd(), '.pipewright', 'config.json');
}

/**
 * Expand ~ to home directory
 */
export function expandPath(path: string, homeDir: string = homedir()): string {
  if (path === '~' || path.startsWith('~/')) {
    return join(homeDir, path.slice(1));
  }
  return path;
}

// =============================================================================
// Loading
// =============================================================================

/**
 * Load and validate configuration
 *
 * @throws {ConfigurationError} If a file is not valid JSON or the merged result fails validation
 */
export function loadConfig(options: LoadConfigOptions = {}): LoadedConfig {
  const sources: string[] = [];
  let merged: RawConfig = {};

  for (const scope of ['global', 'project'] as const) {
    const path = getConfigPath(scope, options);
    if (existsSync(path)) {
      merged = deepMerge(merged, readConfigFile(path));
      sources.push(path);
    }
  }

  merged = deepMerge(merged, envOverrides(options.env ?? process.env));

  return { config: validateConfig(merged), sources };
}

/**
 * Validate a raw config object
 */
export function validateConfig(raw: unknown): PipewrightConfig {
  const result = PipewrightConfig.safeParse(raw);
  if (!result.success) {
    const fieldErrors = toFieldErrors(result.error);
    const summary = Object.entries(fieldErrors)
      .map(([field, message]) => `${field}: ${message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration: ${summary}`, { fieldErrors });
  }
  return result.data;
}

/**
 * Read a config file as a raw object
 */
export function readConfigFile(path: string): RawConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`Failed to read config file ${path}: ${reason}`, {
      cause: err instanceof Error ? err : undefined,
    });
  }
  if (!isPlainObject(parsed)) {
    throw new ConfigurationError(`Config file ${path} must contain a JSON object`);
  }
  return parsed;
}

/**
 * Write a raw config object
 */
export function writeConfigFile(path: string, raw: RawConfig): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, `${JSON.stringify(raw, null, 2)}\n`);
}

// =============================================================================
// Editing
// =============================================================================

/**
 * Read a dotted key (e.g. "runner.retryCount") from a config
 */
export function getConfigValue(config: PipewrightConfig, key: string): unknown {
  let current: unknown = config;
  for (const part of key.split('.')) {
    if (!isPlainObject(current) || !(part in current)) {
      return undefined;
    }
    current = current[part];
  }
  return current;
}

/**
 * Set a dotted key in a config file, coercing the string value to the type the
 * key currently holds, and validate the result before writing.
 *
 * @returns The validated configuration after the change
 */
export function setConfigValue(
  scope: ConfigScope,
  key: string,
  value: string,
  location: ConfigLocation = {}
): PipewrightConfig {
  const path = getConfigPath(scope, location);
  const raw = existsSync(path) ? readConfigFile(path) : {};

  const parts = key.split('.');
  if (parts.length < 2 || parts.some((p) => p.length === 0)) {
    throw new ConfigurationError('Invalid key format. Use: section.key (e.g., storage.backend)');
  }

  const existing = getConfigValue(validateConfig(raw), key);
  const typed = coerceValue(value, existing, key);

  let cursor: RawConfig = raw;
  for (const part of parts.slice(0, -1)) {
    const next = cursor[part];
    if (isPlainObject(next)) {
      cursor = next;
    } else {
      const created: RawConfig = {};
      cursor[part] = created;
      cursor = created;
    }
  }
  cursor[parts[parts.length - 1]] = typed;

  const validated = validateConfig(raw);
  writeConfigFile(path, raw);
  return validated;
}

function coerceValue(value: string, existing: unknown, key: string): unknown {
  if (typeof existing === 'number') {
    const n = Number(value);
    if (value.trim() === '' || Number.isNaN(n)) {
      throw new ConfigurationError(`Value must be a number for ${key}`);
    }
    return n;
  }
  if (typeof existing === 'boolean') {
    return value === 'true' || value === '1' || value === 'yes';
  }
  return value;
}

// =============================================================================
// Helpers
// =============================================================================

function envOverrides(env: NodeJS.ProcessEnv): RawConfig {
  const overrides: RawConfig = {};
  const put = (section: string, key: string, value: unknown) => {
    const existing = overrides[section];
    const target: RawConfig = isPlainObject(existing) ? existing : {};
    target[key] = value;
    overrides[section] = target;
  };

  if (env.PIPEWRIGHT_STORAGE) put('storage', 'backend', env.PIPEWRIGHT_STORAGE);
  if (env.PIPEWRIGHT_DB_PATH) put('storage', 'path', env.PIPEWRIGHT_DB_PATH);
  if (env.PIPEWRIGHT_PIPELINES_DIR) put('pipelines', 'directory', env.PIPEWRIGHT_PIPELINES_DIR);
  if (env.PIPEWRIGHT_STEP_TIMEOUT_MS) put('runner', 'stepTimeoutMs', Number(env.PIPEWRIGHT_STEP_TIMEOUT_MS));
  if (env.GITHUB_TOKEN) put('github', 'token', env.GITHUB_TOKEN);
  if (env.PIPEWRIGHT_WEBHOOK_URL) put('notifications', 'webhookUrl', env.PIPEWRIGHT_WEBHOOK_URL);
  if (env.PIPEWRIGHT_WEBHOOK_SECRET) put('notifications', 'webhookSecret', env.PIPEWRIGHT_WEBHOOK_SECRET);

  return overrides;
}

function deepMerge(base: RawConfig, override: RawConfig): RawConfig {
  const result: RawConfig = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const existing = result[key];
    result[key] = isPlainObject(existing) && isPlainObject(value) ? deepMerge(existing, value) : value;
  }
  return result;
}

function isPlainObject(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toFieldErrors(error: ZodError): Record<string, string> {
  const fieldErrors: Record<string, string> = {};
  for (const issue of error.issues) {
    const field = issue.path.join('.') || '(root)';
    fieldErrors[field] ??= issue.message;
  }
  return fieldErrors;
}
