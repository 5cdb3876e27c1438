/**
 * code stat - Print the checked out branch and commit
 */

import type { Command } from 'commander';
import type { SelectionOptions } from '../../services/selection';
import { withErrorHandler } from '../../utils/errors';
import { addSelectionOptions, runOnHosts } from '../context';

export function registerCodeStatCommand(parent: Command): void {
  addSelectionOptions(
    parent
      .command('stat')
      .description('Show the checked out <branch>:<commit>')
  ).action(withErrorHandler(async (options: SelectionOptions) => {
    await runOnHosts(options, async ({ code }) => {
      await code.stat();
    });
  }));
}
