/**
 * SSH connection type definitions
 */

/**
 * Base SSH connection information
 */
export interface SSHConnectionInfo {
  host: string;
  port: number;
  user: string;
}

/**
 * SSH connection, optionally carrying its own private key.
 * Without a key the system ssh client falls back to the agent and ~/.ssh.
 */
export interface SSHConnection extends SSHConnectionInfo {
  privateKey?: string;
}

/**
 * SSH command execution result
 */
export interface SSHExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}
