/**
 * Validation utilities for the YAML configuration file
 * Provides user-friendly error messages and formatting
 */

import { z } from 'zod';
import chalk from 'chalk';
import { FleetConfigSchema, type FleetConfigOutput } from './config.schema';
import type { Result } from '../types';
import { ok, err } from '../types';

/**
 * Validation error with path and message
 */
export interface ValidationIssue {
  path: string;
  message: string;
  code: string;
}

/**
 * Format Zod path to readable string
 */
export function formatPath(path: PropertyKey[]): string {
  if (path.length === 0) return 'root';

  return path.map((segment, index) => {
    if (typeof segment === 'number') {
      return `[${segment}]`;
    }
    if (typeof segment === 'symbol') {
      return `[Symbol(${segment.description ?? ''})]`;
    }
    return index === 0 ? segment : `.${segment}`;
  }).join('');
}

function transformZodErrors(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: formatPath(issue.path),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Format validation errors for console output
 */
export function formatValidationErrors(errors: ValidationIssue[], fileName: string): string {
  const lines: string[] = [
    chalk.red.bold(`✗ Validation failed for ${fileName}`),
  ];

  for (const error of errors) {
    lines.push(chalk.yellow(`  → ${error.path}`));
    lines.push(chalk.white(`    ${error.message}`));
  }

  lines.push(chalk.gray('  Run `fleetdeploy config validate` for detailed validation'));

  return lines.join('\n');
}

/**
 * Validate config.yml content
 */
export function validateConfig(data: unknown): Result<FleetConfigOutput, ValidationIssue[]> {
  const result = FleetConfigSchema.safeParse(data);

  if (result.success) {
    return ok(result.data);
  }

  return err(transformZodErrors(result.error));
}

/**
 * Get human-readable suggestions for common errors
 */
export function getSuggestion(issue: ValidationIssue): string | null {
  if (issue.path === 'aws' && issue.code === 'invalid_type') {
    return 'Add an aws section with at least vpc_id';
  }

  const suggestions: Record<string, string> = {
    invalid_type: 'Check that the field exists and has the correct type',
    invalid_string: 'Check the format requirements for this field',
    too_small: 'The value is below the allowed minimum',
    too_big: 'The value is above the allowed maximum',
  };

  return suggestions[issue.code] ?? null;
}

/**
 * Print detailed validation report
 */
export function printValidationReport(fileName: string, result: Result<unknown, ValidationIssue[]> | null): void {
  console.log('');
  console.log(chalk.bold('Configuration Validation Report'));
  console.log(chalk.gray('─'.repeat(40)));
  console.log('');

  if (!result) {
    console.log(chalk.gray(`○ ${fileName}: Not found`));
  } else if (result.success) {
    console.log(chalk.green(`✓ ${fileName}: Valid`));
  } else {
    console.log(chalk.red(`✗ ${fileName}: Invalid`));
    for (const error of result.error) {
      console.log(chalk.yellow(`    ${error.path}: ${error.message}`));
      const suggestion = getSuggestion(error);
      if (suggestion) {
        console.log(chalk.gray(`      💡 ${suggestion}`));
      }
    }
  }

  console.log('');
  console.log(chalk.gray('─'.repeat(40)));
  console.log('');
}
