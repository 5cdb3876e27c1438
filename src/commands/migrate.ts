/**
 * Migrate command - Upgrade the database schema
 */

import type { Command } from 'commander';
import type { SelectionOptions } from '../services/selection';
import { withErrorHandler } from '../utils/errors';
import { addSelectionOptions, runOnHosts } from './context';

export function registerMigrateCommand(program: Command): void {
  addSelectionOptions(
    program
      .command('migrate')
      .description('Run the database migrations from the app checkout')
  ).action(withErrorHandler(async (options: SelectionOptions) => {
    await runOnHosts(options, ({ app }) => app.migrate());
  }));
}
