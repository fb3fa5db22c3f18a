/**
 * pipewright config command
 *
 * Show, read and change configuration. `set` writes the project file
 * (.pipewright/config.json) unless --global is given.
 */

import chalk from 'chalk';
import {
  getConfigPath,
  getConfigValue,
  loadConfig,
  setConfigValue,
  type PipewrightConfig,
} from '@pipewright/core';
import type { CommandEnvironment } from '../services.js';

export interface ConfigOptions {
  global?: boolean;
  json?: boolean;
}

const MASK = '********';

/**
 * Copy of the config with credentials masked
 */
export function maskSecrets(config: PipewrightConfig): PipewrightConfig {
  return {
    ...config,
    github: { ...config.github, token: config.github.token ? MASK : undefined },
    notifications: {
      ...config.notifications,
      webhookSecret: config.notifications.webhookSecret ? MASK : undefined,
    },
  };
}

function isSecretKey(key: string): boolean {
  return key === 'github.token' || key === 'notifications.webhookSecret';
}

function setOrNot(value: string | undefined): string {
  return value ? chalk.green('Set') : chalk.dim('Not set');
}

/**
 * Show current configuration
 */
export async function configShowCommand(options: ConfigOptions = {}, deps: CommandEnvironment = {}): Promise<void> {
  const { config, sources } = loadConfig({ cwd: deps.cwd, homeDir: deps.homeDir, env: deps.env });

  if (options.json) {
    console.log(JSON.stringify(maskSecrets(config), null, 2));
    return;
  }

  console.log();
  console.log(chalk.bold('  Configuration'));
  console.log(chalk.dim(`  Sources: ${sources.length > 0 ? sources.join(', ') : 'defaults only'}`));
  console.log();

  console.log(chalk.bold('  Storage:'));
  console.log(`    Backend:          ${chalk.cyan(config.storage.backend)}`);
  console.log(`    Path:             ${chalk.dim(config.storage.path)}`);
  console.log();

  console.log(chalk.bold('  Runner:'));
  console.log(`    Step timeout:     ${chalk.cyan(`${config.runner.stepTimeoutMs}ms`)}`);
  console.log(`    Retries:          ${chalk.cyan(String(config.runner.retryCount))}`);
  console.log(`    Retry delay:      ${chalk.cyan(`${config.runner.retryDelayMs}ms`)}`);
  console.log();

  console.log(chalk.bold('  GitHub:'));
  console.log(`    Token:            ${setOrNot(config.github.token)}`);
  if (config.github.apiBaseUrl) {
    console.log(`    API URL:          ${chalk.dim(config.github.apiBaseUrl)}`);
  }
  console.log(`    Workdir:          ${chalk.dim(config.github.workdir)}`);
  console.log(`    Remote:           ${chalk.dim(config.github.remote)}`);
  console.log();

  console.log(chalk.bold('  Notifications:'));
  console.log(`    Webhook:          ${config.notifications.webhookUrl ? chalk.cyan(config.notifications.webhookUrl) : chalk.dim('Not set')}`);
  console.log(`    Webhook secret:   ${setOrNot(config.notifications.webhookSecret)}`);
  console.log();

  console.log(chalk.bold('  Pipelines:'));
  console.log(`    Directory:        ${chalk.dim(config.pipelines.directory)}`);
  console.log();

  const environments = Object.entries(config.environments);
  if (environments.length > 0) {
    console.log(chalk.bold('  Environments:'));
    for (const [name, env] of environments) {
      const keys = Object.keys(env.context);
      console.log(`    ${name}: ${chalk.dim(keys.length > 0 ? keys.join(', ') : '(no context values)')}`);
    }
    console.log();
  }
}

/**
 * Print one configuration value
 */
export async function configGetCommand(key: string, options: ConfigOptions = {}, deps: CommandEnvironment = {}): Promise<void> {
  const { config } = loadConfig({ cwd: deps.cwd, homeDir: deps.homeDir, env: deps.env });
  const value = getConfigValue(isSecretKey(key) ? maskSecrets(config) : config, key);

  if (value === undefined) {
    console.log(options.json ? 'null' : chalk.dim('(not set)'));
    return;
  }
  console.log(typeof value === 'object' || options.json ? JSON.stringify(value, null, 2) : String(value));
}

/**
 * Set a configuration value
 */
export async function configSetCommand(
  key: string,
  value: string,
  options: ConfigOptions = {},
  deps: CommandEnvironment = {}
): Promise<void> {
  const scope = options.global ? 'global' : 'project';
  const location = { cwd: deps.cwd, homeDir: deps.homeDir };
  const updated = setConfigValue(scope, key, value, location);

  const shown = isSecretKey(key) ? MASK : JSON.stringify(getConfigValue(updated, key));
  console.log(chalk.green(`✓ Set ${key} = ${shown}`));
  console.log(chalk.dim(`  Saved to ${getConfigPath(scope, location)}`));
}
