/**
 * SSH Key Management utilities
 *
 * Handles private key normalization, temporary key file creation,
 * and SSH argument building for the system ssh client.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { DEFAULT_SSH_PORT, DEFAULT_SSH_TIMEOUT } from '../constants';
import type { SSHConnection, Result } from '../types';
import { ok, err, toError } from '../types';
import { CLIError, ErrorCode } from './errors';
import { printWarning } from './output';

/**
 * Normalize SSH private key format.
 * Handles escaped newlines and different line ending formats.
 */
export function normalizePrivateKey(privateKey: string): string {
  let normalized = privateKey
    .replace(/\\n/g, '\n')       // Handle escaped newlines
    .replace(/\r\n/g, '\n')      // Normalize Windows line endings
    .replace(/\r/g, '\n');       // Handle old Mac line endings

  // Ensure the key ends with a newline (required by SSH)
  if (!normalized.endsWith('\n')) {
    normalized += '\n';
  }

  return normalized;
}

/**
 * Validate SSH private key format
 */
export function isValidPrivateKey(key: string): boolean {
  const normalized = normalizePrivateKey(key);
  return normalized.includes('-----BEGIN') && normalized.includes('PRIVATE KEY-----');
}

/**
 * Create a temporary SSH key file readable by the owner only
 */
export function createTempKeyFile(privateKey: string): Result<string, Error> {
  try {
    const keyFile = path.join(os.tmpdir(), `fleetdeploy_key_${Date.now()}_${Math.random().toString(36).slice(2)}`);
    fs.writeFileSync(keyFile, normalizePrivateKey(privateKey), { mode: 0o600 });
    return ok(keyFile);
  } catch (error) {
    return err(toError(error));
  }
}

/**
 * Clean up temporary key file
 */
export function cleanupKeyFile(keyFile: string): void {
  try {
    if (fs.existsSync(keyFile)) {
      fs.unlinkSync(keyFile);
    }
  } catch (error) {
    printWarning(`Could not remove temporary key file ${keyFile}: ${toError(error).message}`);
  }
}

export interface SSHArgsOptions {
  strictHostKeyChecking?: boolean;
  timeout?: number;
  batchMode?: boolean;
}

/**
 * Build SSH command arguments for a connection.
 * Without a key file the client's agent and default identities are used.
 */
export function buildSSHArgs(
  conn: SSHConnection,
  keyFile: string | undefined,
  options: SSHArgsOptions = {}
): string[] {
  const {
    strictHostKeyChecking = false,
    timeout = DEFAULT_SSH_TIMEOUT,
    batchMode = true,
  } = options;

  const args: string[] = [];

  if (keyFile) {
    args.push('-i', keyFile, '-o', 'IdentitiesOnly=yes');
  }

  args.push(
    '-o', `StrictHostKeyChecking=${strictHostKeyChecking ? 'yes' : 'no'}`,
    '-o', 'UserKnownHostsFile=/dev/null',
    '-o', 'LogLevel=ERROR',
    '-o', `BatchMode=${batchMode ? 'yes' : 'no'}`,
    '-o', `ConnectTimeout=${timeout}`,
    '-p', (conn.port || DEFAULT_SSH_PORT).toString(),
    `${conn.user}@${conn.host}`,
  );

  return args;
}

/**
 * Get the SSH command name
 */
export function getSSHCommand(): string {
  return process.env.FLEETDEPLOY_SSH_COMMAND || 'ssh';
}

/**
 * Run an operation with a temporary key file when the connection has a key.
 * The file is removed once the operation settles.
 */
export async function withKeyFile<T>(
  privateKey: string | undefined,
  operation: (keyFile: string | undefined) => Promise<T>
): Promise<T> {
  if (!privateKey) {
    return operation(undefined);
  }

  if (!isValidPrivateKey(privateKey)) {
    throw new CLIError(
      'SSH private key is not in PEM or OpenSSH format',
      ErrorCode.SSH_KEY_INVALID,
      'Check FLEETDEPLOY_SSH_PRIVATE_KEY (escaped "\\n" newlines are accepted)'
    );
  }

  const keyFileResult = createTempKeyFile(privateKey);
  if (!keyFileResult.success) {
    throw keyFileResult.error;
  }

  const keyFile = keyFileResult.data;
  try {
    return await operation(keyFile);
  } finally {
    cleanupKeyFile(keyFile);
  }
}
