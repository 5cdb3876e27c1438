/**
 * Secrets loading utilities
 * Supports loading secrets (AWS credentials, SSH private key) from:
 * - .env.fleetdeploy file (for local use)
 * - JSON file (for CI environments)
 * - FLEETDEPLOY_SECRETS environment variable (JSON string)
 */

import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { ENV_FILE_PATH } from '../constants';
import { printWarning, printDebug } from './output';
import { ConfigError } from './errors';

/**
 * Parse a dotenv file content into key-value pairs
 */
export function parseDotenv(content: string): Record<string, string> {
  const result: Record<string, string> = {};

  for (const line of content.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;

    const eqIndex = trimmed.indexOf('=');
    if (eqIndex === -1) continue;

    const key = trimmed.slice(0, eqIndex).trim();
    let value = trimmed.slice(eqIndex + 1).trim();

    // Remove surrounding quotes
    if ((value.startsWith('"') && value.endsWith('"')) ||
        (value.startsWith("'") && value.endsWith("'"))) {
      value = value.slice(1, -1);
    }

    if (key) result[key] = value;
  }

  return result;
}

/**
 * Check if we're running in CI environment
 */
export function isCI(env: NodeJS.ProcessEnv = process.env): boolean {
  return !!(
    env.CI ||
    env.GITHUB_ACTIONS ||
    env.GITLAB_CI ||
    env.JENKINS_URL ||
    env.BUILDKITE
  );
}

function parseSecretsJson(content: string, source: string): Record<string, string> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(
      `Failed to parse secrets from ${source}: ${error instanceof Error ? error.message : String(error)}`,
      'Secrets must be a JSON object of string values'
    );
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError(`Secrets from ${source} must be a JSON object`);
  }

  const secrets: Record<string, string> = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (typeof value === 'string') {
      secrets[key] = value;
    }
  }
  return secrets;
}

function applySecrets(secrets: Record<string, string>, env: NodeJS.ProcessEnv): number {
  let count = 0;
  for (const [key, value] of Object.entries(secrets)) {
    if (value.trim() !== '') {
      env[key] = value;
      count++;
    }
  }
  return count;
}

/**
 * Load secrets into the environment from the first available source
 * Priority: .env.fleetdeploy > JSON file > FLEETDEPLOY_SECRETS env var
 *
 * @returns the source the secrets came from, or null when none was found
 */
export function loadSecrets(root: string = process.cwd(), env: NodeJS.ProcessEnv = process.env): string | null {
  const envFile = join(root, ENV_FILE_PATH);

  if (existsSync(envFile)) {
    const count = applySecrets(parseDotenv(readFileSync(envFile, 'utf-8')), env);

    if (isCI(env)) {
      printWarning(`${ENV_FILE_PATH} file detected in CI environment!`);
      printWarning(`This file should NOT be committed to your repository.`);
    }

    printDebug(`Loaded secrets from ${ENV_FILE_PATH}`, { count });
    return ENV_FILE_PATH;
  }

  const secretsPath = env.FLEETDEPLOY_SECRETS_FILE;
  if (secretsPath && existsSync(secretsPath)) {
    const count = applySecrets(parseSecretsJson(readFileSync(secretsPath, 'utf-8'), secretsPath), env);
    printDebug(`Loaded secrets from ${secretsPath}`, { count });
    return secretsPath;
  }

  const secretsEnv = env.FLEETDEPLOY_SECRETS;
  if (secretsEnv) {
    const count = applySecrets(parseSecretsJson(secretsEnv, 'FLEETDEPLOY_SECRETS'), env);
    printDebug('Loaded secrets from FLEETDEPLOY_SECRETS', { count });
    return 'FLEETDEPLOY_SECRETS';
  }

  return null;
}
