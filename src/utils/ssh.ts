/**
 * SSH utilities using the native ssh command.
 * Supports all key types including ed25519.
 */

import { spawn } from 'child_process';
import type { SSHConnection, SSHExecResult } from '../types';
import { buildSSHArgs, getSSHCommand, withKeyFile, type SSHArgsOptions } from './ssh-keys';
import { ConnectionError } from './errors';

export interface SSHExecOptions extends SSHArgsOptions {
  onStdout?: (data: string) => void;
  onStderr?: (data: string) => void;
}

/**
 * Execute a command via SSH, capturing output and optionally streaming it
 */
export async function sshExecStream(
  conn: SSHConnection,
  command: string,
  options: SSHExecOptions = {}
): Promise<SSHExecResult> {
  const { onStdout, onStderr, ...argsOptions } = options;

  return withKeyFile(conn.privateKey, (keyFile) => new Promise<SSHExecResult>((resolve, reject) => {
    const sshArgs = [...buildSSHArgs(conn, keyFile, argsOptions), command];

    const proc = spawn(getSSHCommand(), sshArgs, {
      shell: false,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    let stdout = '';
    let stderr = '';

    proc.stdout.on('data', (data: Buffer) => {
      const str = data.toString();
      stdout += str;
      onStdout?.(str);
    });

    proc.stderr.on('data', (data: Buffer) => {
      const str = data.toString();
      stderr += str;
      onStderr?.(str);
    });

    proc.on('error', (error) => {
      reject(new ConnectionError(
        `SSH command failed to start for ${conn.user}@${conn.host}: ${error.message}`,
        'Check that the ssh client is installed and on PATH',
        error
      ));
    });

    proc.on('close', (code) => {
      resolve({ stdout, stderr, exitCode: code ?? 1 });
    });
  }));
}
