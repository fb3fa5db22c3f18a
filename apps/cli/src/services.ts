/**
 * Service wiring for CLI commands
 *
 * Builds the adapters the built-in steps call from configuration. Adapters
 * are constructed on first use, so a pipeline that never touches GitHub
 * needs no token.
 */

import { resolve } from 'node:path';
import {
  createLogger,
  createRunReportStore,
  expandPath,
  loadConfig,
  parseSeverity,
  type Logger,
  type PipewrightConfig,
  type RunReportStore,
} from '@pipewright/core';
import {
  CompositeSink,
  ExecFileRunner,
  GitHubHost,
  GitWorkspace,
  KubectlPlane,
  LogSink,
  TerraformTool,
  WebhookSink,
  type InfrastructureTool,
  type NotificationSink,
  type OrchestrationPlane,
  type StepServices,
  type VersionControlHost,
} from '@pipewright/engine';

/**
 * Where a command looks for configuration and relative paths
 */
export interface CommandEnvironment {
  /** Project directory (default: process.cwd()) */
  cwd?: string;
  /** Home directory for the global config (default: os.homedir()) */
  homeDir?: string;
  /** Environment variables (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

export function loadCommandConfig(environment: CommandEnvironment): PipewrightConfig {
  return loadConfig({ cwd: environment.cwd, homeDir: environment.homeDir, env: environment.env }).config;
}

export function projectDir(environment: CommandEnvironment): string {
  return environment.cwd ?? process.cwd();
}

export function pipelinesDir(config: PipewrightConfig, environment: CommandEnvironment): string {
  return resolve(projectDir(environment), config.pipelines.directory);
}

/**
 * Logger for a command: DEBUG with --verbose, else LOG_LEVEL, else WARNING
 * (stderr stays quiet so --json output can be piped)
 */
export function createCommandLogger(verbose: boolean | undefined, environment: CommandEnvironment): Logger {
  const env = environment.env ?? process.env;
  return createLogger('pipewright', {
    minSeverity: verbose ? 'DEBUG' : (parseSeverity(env.LOG_LEVEL) ?? 'WARNING'),
  });
}

function lazy<T>(create: () => T): () => T {
  let instance: T | undefined;
  return () => {
    instance ??= create();
    return instance;
  };
}

/**
 * Notification sink from configuration: the log always, plus a webhook when set
 */
export function createNotificationSink(config: PipewrightConfig, logger: Logger): NotificationSink {
  const log = new LogSink(logger);
  const { webhookUrl, webhookSecret } = config.notifications;
  if (!webhookUrl) {
    return log;
  }
  return new CompositeSink([new WebhookSink({ url: webhookUrl, secret: webhookSecret }), log]);
}

export function createStepServices(
  config: PipewrightConfig,
  logger: Logger,
  environment: CommandEnvironment = {}
): StepServices {
  const cwd = projectDir(environment);
  const runner = new ExecFileRunner();

  const vcs = lazy<VersionControlHost>(
    () =>
      new GitHubHost({
        token: config.github.token,
        baseUrl: config.github.apiBaseUrl,
        workspace: new GitWorkspace(runner, {
          workdir: resolve(cwd, config.github.workdir),
          remote: config.github.remote,
        }),
      })
  );
  const orchestration = lazy<OrchestrationPlane>(() => new KubectlPlane(runner, { cwd }));
  const infrastructure = lazy<InfrastructureTool>(() => new TerraformTool(runner));

  return {
    vcs,
    orchestration,
    infrastructure,
    notifications: createNotificationSink(config, logger),
    workdir: cwd,
  };
}

export function openRunStore(config: PipewrightConfig, environment: CommandEnvironment): RunReportStore {
  return createRunReportStore({
    ...config.storage,
    path: config.storage.path === ':memory:' ? ':memory:' : expandPath(config.storage.path, environment.homeDir),
  });
}
