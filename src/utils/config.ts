/**
 * Configuration utilities
 * Reads .deployment/config.yml and turns it into the frozen Settings bundle
 */

import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { parse as parseYaml } from 'yaml';
import { CONFIG_PATH } from '../constants';
import { validateConfig, formatValidationErrors, type FleetConfigOutput } from '../schemas';
import type { Settings } from '../types';
import { ConfigError, ErrorCode } from './errors';

/**
 * Get the project root directory (where .deployment folder is)
 */
export function getProjectRoot(): string {
  return process.cwd();
}

export function getConfigPath(root: string = getProjectRoot()): string {
  return join(root, CONFIG_PATH);
}

/**
 * Read and parse the raw YAML config, or null when the file does not exist
 */
export function readConfigFile(root: string = getProjectRoot()): unknown {
  const configPath = getConfigPath(root);

  if (!existsSync(configPath)) {
    return null;
  }

  try {
    return parseYaml(readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(
      `Error reading ${CONFIG_PATH}: ${error instanceof Error ? error.message : String(error)}`,
      'Check the YAML syntax of the file'
    );
  }
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const nested of Object.values(value)) {
    if (typeof nested === 'object' && nested !== null && !Object.isFrozen(nested)) {
      deepFreeze(nested);
    }
  }
  return Object.freeze(value);
}

/**
 * Build settings from a validated config, applying environment overrides
 */
export function buildSettings(config: FleetConfigOutput, env: NodeJS.ProcessEnv = process.env): Settings {
  const settings: Settings = {
    appName: env.FLEETDEPLOY_APP_NAME || config.app_name,
    aws: {
      region: env.AWS_REGION || config.aws.region,
      vpcId: config.aws.vpc_id,
      groupId: config.aws.group_id,
      environmentTag: config.aws.environment_tag,
      disabledTag: config.aws.disabled_tag,
      apiSubnetIds: [...config.aws.api_subnet_ids],
      workerSubnetIds: [...config.aws.worker_subnet_ids],
    },
    ssh: {
      user: env.FLEETDEPLOY_SSH_USER || config.ssh.user,
      port: config.ssh.port,
      privateKey: env.FLEETDEPLOY_SSH_PRIVATE_KEY || undefined,
      connectTimeoutSecs: config.ssh.connect_timeout,
    },
    timing: {
      startupDelaySecs: config.timing.startup_delay,
      waitTimeoutSecs: config.timing.wait_timeout,
      pollIntervalSecs: config.timing.poll_interval,
    },
    remote: {
      healthFile: config.remote.health_file,
      healthUrl: config.remote.health_url,
      cachePattern: config.remote.cache_pattern,
      shellPattern: config.remote.shell_pattern,
    },
  };

  return deepFreeze(settings);
}

/**
 * Load, validate and freeze the settings for this run
 */
export function loadSettings(root: string = getProjectRoot(), env: NodeJS.ProcessEnv = process.env): Settings {
  const raw = readConfigFile(root);

  if (raw === null) {
    throw new ConfigError(
      `${CONFIG_PATH} not found`,
      'Create it with at least an aws.vpc_id entry',
      ErrorCode.CONFIG_NOT_FOUND
    );
  }

  const result = validateConfig(raw);
  if (!result.success) {
    throw new ConfigError(formatValidationErrors(result.error, CONFIG_PATH));
  }

  return buildSettings(result.data, env);
}

/**
 * Get the application name, failing before any remote work when it is missing
 */
export function requireAppName(settings: Settings): string {
  if (!settings.appName) {
    throw new ConfigError(
      'app_name is not configured',
      `Add app_name to ${CONFIG_PATH} or set FLEETDEPLOY_APP_NAME`
    );
  }
  return settings.appName;
}
