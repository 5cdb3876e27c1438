/**
 * Remote Executor
 *
 * Runs shell commands on one host over the system ssh client, streaming the
 * output to the console with a host prefix.
 */

import { PROFILE_SHELL } from '../constants';
import type { SSHConnection, SSHExecResult, Settings } from '../types';
import { RemoteCommandError } from '../utils/errors';
import { printDebug, printRaw, printWarning, prefixLines } from '../utils/output';
import { sshExecStream } from '../utils/ssh';

export interface RunOptions {
  /** Directory to run the command in */
  cwd?: string;
  /** Report a non-zero exit as a warning instead of failing */
  warnOnly?: boolean;
}

export interface RemoteExecutor {
  readonly host: string;
  run(command: string, options?: RunOptions): Promise<SSHExecResult>;
  /** Run through an interactive shell so the login profile is loaded */
  runWithShellProfile(command: string, options?: RunOptions): Promise<SSHExecResult>;
}

/**
 * Quote a string for a POSIX shell
 */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * Compose the command line sent to the host
 */
export function buildRemoteCommand(command: string, options: { cwd?: string; shell?: string } = {}): string {
  const full = options.cwd ? `cd ${options.cwd} && ${command}` : command;
  return options.shell ? `${options.shell} ${shellQuote(full)}` : full;
}

/**
 * Prints whole lines with the host prefix, holding back a partial line until
 * its newline arrives or the stream ends
 */
class PrefixedLineWriter {
  private pending = '';

  constructor(private readonly host: string) {}

  write(data: string): void {
    const text = this.pending + data;
    const end = text.lastIndexOf('\n');
    if (end === -1) {
      this.pending = text;
      return;
    }
    this.pending = text.slice(end + 1);
    printRaw(prefixLines(this.host, text.slice(0, end + 1)));
  }

  flush(): void {
    if (this.pending.length > 0) {
      printRaw(prefixLines(this.host, this.pending));
      this.pending = '';
    }
  }
}

/**
 * Executor over ssh for a single host
 */
export class SSHExecutor implements RemoteExecutor {
  constructor(
    private readonly connection: SSHConnection,
    private readonly connectTimeoutSecs?: number
  ) {}

  get host(): string {
    return this.connection.host;
  }

  run(command: string, options: RunOptions = {}): Promise<SSHExecResult> {
    return this.exec(command, buildRemoteCommand(command, { cwd: options.cwd }), options);
  }

  runWithShellProfile(command: string, options: RunOptions = {}): Promise<SSHExecResult> {
    return this.exec(command, buildRemoteCommand(command, { cwd: options.cwd, shell: PROFILE_SHELL }), options);
  }

  private async exec(command: string, remoteCommand: string, options: RunOptions): Promise<SSHExecResult> {
    printRaw(prefixLines(this.host, `$ ${command}`));
    printDebug('Remote command', { host: this.host, command: remoteCommand });

    const stdout = new PrefixedLineWriter(this.host);
    const stderr = new PrefixedLineWriter(this.host);

    let result: SSHExecResult;
    try {
      result = await sshExecStream(this.connection, remoteCommand, {
        timeout: this.connectTimeoutSecs,
        onStdout: (data) => stdout.write(data),
        onStderr: (data) => stderr.write(data),
      });
    } finally {
      stdout.flush();
      stderr.flush();
    }

    if (result.exitCode !== 0) {
      if (options.warnOnly) {
        printWarning(`${this.host}: "${command}" exited with ${result.exitCode}`);
      } else {
        throw new RemoteCommandError(this.host, command, result.exitCode, result.stderr);
      }
    }

    return result;
  }
}

/**
 * Create an executor for a host using the configured ssh settings
 */
export function createRemoteExecutor(host: string, settings: Pick<Settings, 'ssh'>): RemoteExecutor {
  return new SSHExecutor(
    {
      host,
      port: settings.ssh.port,
      user: settings.ssh.user,
      privateKey: settings.ssh.privateKey,
    },
    settings.ssh.connectTimeoutSecs
  );
}
