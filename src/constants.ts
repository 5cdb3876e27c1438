/**
 * Application-wide constants
 */

import { readFileSync } from 'fs';
import { join } from 'path';

// Read version from root package.json (single source of truth)
function readPackageVersion(): string {
  const packageJson: unknown = JSON.parse(readFileSync(join(__dirname, '..', 'package.json'), 'utf-8'));
  if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson && typeof packageJson.version === 'string') {
    return packageJson.version;
  }
  return '0.0.0';
}

export const FLEETDEPLOY_VERSION = readPackageVersion();

/**
 * Default values
 */
export const DEFAULT_SSH_PORT = 22;
export const DEFAULT_SSH_TIMEOUT = 10;
export const DEFAULT_SSH_USER = 'deploy';
export const DEFAULT_AWS_REGION = 'us-west-1';

/**
 * Inventory tags
 */
export const DEFAULT_ENVIRONMENT_TAG = 'ChefEnvironment';
export const DEFAULT_DISABLED_TAG = 'Disabled';
export const NAME_TAG = 'Name';

/**
 * Timing defaults (seconds)
 */
export const DEFAULT_STARTUP_DELAY_SECS = 5;
export const DEFAULT_WAIT_TIMEOUT_SECS = 60;
export const DEFAULT_POLL_INTERVAL_SECS = 5;

/**
 * Remote host defaults
 */
export const DEFAULT_HEALTH_FILE = '/var/lib/app/health';
export const DEFAULT_HEALTH_URL = 'http://127.0.0.1:5000/health';
export const HEALTH_FILE_CONTENT = 'finding your center';
export const PROFILE_SHELL = 'bash -i -c';
export const DEFAULT_SHELL_PATTERN = '^python.*shell$';
export const DEFAULT_CACHE_PATTERN = '.+\\.pyc';
export const DEFAULT_BRANCH = 'release';
export const DEFAULT_COMMIT = 'HEAD';

/**
 * File paths (relative to project root)
 */
export const CONFIG_PATH = '.deployment/config.yml';
export const ENV_FILE_PATH = '.env.fleetdeploy';
