/**
 * Command Error Handling
 *
 * Provides centralized error handling for CLI commands.
 * This module ensures consistent error messages and exit behavior
 * across all commands.
 */

import { printBlank, printRaw, colors, isDebugEnabled } from './output';

/**
 * CLI Error codes for different failure scenarios
 */
export enum ErrorCode {
  // General errors (1-9)
  UNKNOWN = 1,
  COMMAND_FAILED = 3,

  // Configuration errors (10-19)
  CONFIG_NOT_FOUND = 10,
  CONFIG_INVALID = 11,

  // Inventory errors (20-29)
  LB_NOT_FOUND = 20,
  NO_HOSTS_SELECTED = 21,
  INVENTORY_FAILED = 22,

  // Connection errors (30-39)
  CONNECTION_FAILED = 30,
  SSH_KEY_INVALID = 31,

  // Load balancer health errors (50-59)
  HEALTH_WAIT_TIMEOUT = 50,

  // Validation errors (60-69)
  VALIDATION_FAILED = 60,
  INVALID_ARGUMENT = 61,
}

/**
 * Base CLI error class with structured information
 */
export class CLIError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode = ErrorCode.UNKNOWN,
    public readonly suggestion?: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'CLIError';
  }

  /**
   * Create error from unknown thrown value
   */
  static from(error: unknown, code: ErrorCode = ErrorCode.UNKNOWN): CLIError {
    if (error instanceof CLIError) {
      return error;
    }
    if (error instanceof Error) {
      return new CLIError(error.message, code, undefined, error);
    }
    return new CLIError(String(error), code);
  }
}

/**
 * Specific error types for common scenarios
 */
export class ConfigError extends CLIError {
  constructor(message: string, suggestion?: string, code: ErrorCode = ErrorCode.CONFIG_INVALID) {
    super(message, code, suggestion);
    this.name = 'ConfigError';
  }
}

export class ConnectionError extends CLIError {
  constructor(message: string, suggestion?: string, cause?: Error) {
    super(message, ErrorCode.CONNECTION_FAILED, suggestion, cause);
    this.name = 'ConnectionError';
  }
}

export class ValidationError extends CLIError {
  constructor(message: string, suggestion?: string) {
    super(message, ErrorCode.INVALID_ARGUMENT, suggestion);
    this.name = 'ValidationError';
  }
}

/**
 * A load balancer hint that names no known load balancer
 */
export class NotFoundError extends CLIError {
  constructor(public readonly hint: string, known: readonly string[] = []) {
    super(
      `Unknown load balancer "${hint}"`,
      ErrorCode.LB_NOT_FOUND,
      known.length > 0 ? `Known load balancers: ${known.join(', ')}` : undefined
    );
    this.name = 'NotFoundError';
  }
}

/**
 * Load balancers did not reach the wanted health state in time
 */
export class WaitTimeoutError extends CLIError {
  constructor(
    public readonly timeoutSecs: number,
    public readonly host: string,
    public readonly pending: readonly string[]
  ) {
    super(
      `Timed out after ${timeoutSecs}s waiting on ${host} for load balancer(s): ${pending.join(', ')}`,
      ErrorCode.HEALTH_WAIT_TIMEOUT,
      'Check the health endpoint on the host, then re-run the task'
    );
    this.name = 'WaitTimeoutError';
  }
}

/**
 * A remote command exited with a non-zero status
 */
export class RemoteCommandError extends CLIError {
  constructor(
    public readonly host: string,
    public readonly command: string,
    public readonly exitCode: number,
    public readonly stderr: string
  ) {
    super(
      `Command failed on ${host} (exit ${exitCode}): ${command}`,
      ErrorCode.COMMAND_FAILED,
      stderr.trim() ? stderr.trim().split('\n').slice(-1)[0] : undefined
    );
    this.name = 'RemoteCommandError';
  }
}

/**
 * Format error for display
 */
export function formatError(error: CLIError): string {
  const lines: string[] = [];

  lines.push(colors.error(`Error: ${error.message}`));

  if (error.suggestion) {
    lines.push(colors.dim(`  → ${error.suggestion}`));
  }

  if (isDebugEnabled() && error.cause) {
    lines.push(colors.dim(`  Caused by: ${error.cause.message}`));
    if (error.cause.stack) {
      lines.push(colors.dim(error.cause.stack));
    }
  }

  return lines.join('\n');
}

/**
 * Handle error and exit process
 * This is the ONLY place that should call process.exit for errors
 */
export function handleError(error: unknown): never {
  const cliError = CLIError.from(error);

  printBlank();
  printRaw(formatError(cliError));
  printBlank();

  process.exit(cliError.code);
}

/**
 * Type for async command action handlers
 */
export type CommandAction<T extends unknown[] = unknown[]> = (...args: T) => Promise<void>;

/**
 * Wrap a command action with error handling
 *
 * Usage:
 * ```typescript
 * .action(withErrorHandler(async (options) => {
 *   if (!valid) throw new ValidationError('Invalid input');
 * }))
 * ```
 */
export function withErrorHandler<T extends unknown[]>(
  action: CommandAction<T>
): CommandAction<T> {
  return async (...args: T): Promise<void> => {
    try {
      await action(...args);
    } catch (error) {
      handleError(error);
    }
  };
}
