/**
 * Shells command - Fail when an interactive application shell is open on a host
 */

import type { Command } from 'commander';
import type { SelectionOptions } from '../services/selection';
import { withErrorHandler } from '../utils/errors';
import { addSelectionOptions, runOnHosts } from './context';

export function registerShellsCommand(program: Command): void {
  addSelectionOptions(
    program
      .command('shells')
      .description('Check that no interactive application shell is running')
  ).action(withErrorHandler(async (options: SelectionOptions) => {
    await runOnHosts(options, ({ app }) => app.shells());
  }));
}
