/**
 * Output formatting utilities
 */

import chalk from 'chalk';

export const colors = {
  success: chalk.green,
  error: chalk.red,
  warning: chalk.yellow,
  info: chalk.cyan,
  dim: chalk.gray,
  bold: chalk.bold,
  host: chalk.magenta,
};

let debugEnabled = Boolean(process.env.DEBUG);

/**
 * Turn debug output on or off (the --debug flag, or DEBUG in the environment)
 */
export function setDebug(enabled: boolean): void {
  debugEnabled = enabled;
}

export function isDebugEnabled(): boolean {
  return debugEnabled;
}

export function printSuccess(message: string): void {
  console.log(colors.success(`✓ ${message}`));
}

export function printWarning(message: string): void {
  console.log(colors.warning(`⚠ ${message}`));
}

export function printInfo(message: string): void {
  console.log(colors.info(`→ ${message}`));
}

export function printBlank(): void {
  console.log('');
}

export function printRaw(message: string): void {
  console.log(message);
}

export function printDebug(message: string, context?: Record<string, unknown>): void {
  if (!debugEnabled) return;
  const suffix = context ? ` ${JSON.stringify(context)}` : '';
  console.log(colors.dim(`[debug] ${message}${suffix}`));
}

export function printSection(title: string): void {
  console.log('');
  console.log(colors.info(`=== ${title} ===`));
}

export function printKeyValue(key: string, value: string): void {
  console.log(`${colors.dim(key + ':')} ${value}`);
}

/**
 * Prefix every line of remote output with the host it came from
 */
export function prefixLines(host: string, text: string): string {
  const prefix = colors.host(`[${host}]`);
  return text
    .split('\n')
    .filter((line, index, lines) => line.length > 0 || index < lines.length - 1)
    .map((line) => `${prefix} ${line}`)
    .join('\n');
}

