/**
 * Flag parsing for task options
 *
 * Task options are passed as short string literals (`--wait t`,
 * `--skip-enable false`, `--wait 30`).
 */

import { ValidationError } from './errors';

const TRUE_LITERALS = new Set(['1', 't', 'true']);
const FALSE_LITERALS = new Set(['0', 'f', 'false']);

/**
 * Parse a boolean flag literal
 */
export function parseFlag(raw: string | boolean): boolean {
  if (typeof raw === 'boolean') {
    return raw;
  }

  const value = raw.trim().toLowerCase();
  if (TRUE_LITERALS.has(value)) return true;
  if (FALSE_LITERALS.has(value)) return false;

  throw new ValidationError(
    `Invalid flag value "${raw}"`,
    'Use one of: 1, t, true, 0, f, false'
  );
}

/**
 * Parse a wait option into a timeout in seconds.
 *
 * - an integer literal is the timeout itself (0 checks once)
 * - a true flag means the default timeout
 * - a false flag means 0: check once, without waiting
 */
export function parseWait(raw: string | boolean, defaultTimeoutSecs: number): number {
  if (typeof raw === 'string' && /^\s*\d+\s*$/.test(raw)) {
    return parseInt(raw, 10);
  }

  return parseFlag(raw) ? defaultTimeoutSecs : 0;
}
