/**
 * Configuration Schema
 *
 * @module @pipewright/core/config/schema
 */

import { z } from 'zod';

export const StorageBackend = z.enum(['sqlite', 'memory']);
export type StorageBackend = z.infer<typeof StorageBackend>;

export const StorageConfig = z.object({
  /** Run-report store backend */
  backend: StorageBackend.default('sqlite'),
  /** SQLite database path (~ expands to the home directory) */
  path: z.string().min(1).default('~/.pipewright/runs.db'),
});
export type StorageConfig = z.infer<typeof StorageConfig>;

export const RunnerConfig = z.object({
  /** Default per-step timeout (5 min, matching `--timeout=300s` conventions) */
  stepTimeoutMs: z.number().int().positive().default(300_000),
  /** Retries granted to a retryable step after its first attempt */
  retryCount: z.number().int().min(0).max(10).default(1),
  /** Fixed delay between attempts */
  retryDelayMs: z.number().int().min(0).max(60_000).default(2_000),
});
export type RunnerConfig = z.infer<typeof RunnerConfig>;

export const GitHubConfig = z.object({
  token: z.string().optional(),
  /** REST API base URL (GitHub Enterprise) */
  apiBaseUrl: z.string().url().optional(),
  /** Local clone used for revert commits */
  workdir: z.string().default('.'),
  /** Remote that revert branches are pushed to */
  remote: z.string().default('origin'),
});
export type GitHubConfig = z.infer<typeof GitHubConfig>;

export const NotificationsConfig = z.object({
  webhookUrl: z.string().url().optional(),
  webhookSecret: z.string().optional(),
});
export type NotificationsConfig = z.infer<typeof NotificationsConfig>;

export const PipelinesConfig = z.object({
  /** Directory holding `<name>.yaml` / `<name>.json` pipeline definitions */
  directory: z.string().default('pipelines'),
});
export type PipelinesConfig = z.infer<typeof PipelinesConfig>;

export const EnvironmentConfig = z.object({
  /** Values seeded into the execution context for runs in this environment */
  context: z.record(z.string(), z.string()).default({}),
});
export type EnvironmentConfig = z.infer<typeof EnvironmentConfig>;

export const PipewrightConfig = z.object({
  storage: StorageConfig.default({}),
  runner: RunnerConfig.default({}),
  github: GitHubConfig.default({}),
  notifications: NotificationsConfig.default({}),
  pipelines: PipelinesConfig.default({}),
  environments: z.record(z.string(), EnvironmentConfig).default({}),
});

export type PipewrightConfig = z.infer<typeof PipewrightConfig>;

/**
 * Fully defaulted configuration
 */
export function defaultConfig(): PipewrightConfig {
  return PipewrightConfig.parse({});
}
