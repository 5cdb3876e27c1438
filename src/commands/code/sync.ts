/**
 * code sync - Fetch and check out a branch (and optionally a commit)
 */

import type { Command } from 'commander';
import { DEFAULT_BRANCH, DEFAULT_COMMIT } from '../../constants';
import type { SelectionOptions } from '../../services/selection';
import { withErrorHandler } from '../../utils/errors';
import { parseFlag } from '../../utils/flags';
import { addSelectionOptions, runOnHosts } from '../context';

interface SyncCommandOptions extends SelectionOptions {
  branch: string;
  commit: string;
  clearCached: string;
}

export function registerCodeSyncCommand(parent: Command): void {
  addSelectionOptions(
    parent
      .command('sync')
      .description('Fetch and check out code')
      .option('-b, --branch <branch>', 'Branch to check out', DEFAULT_BRANCH)
      .option('-c, --commit <commit>', 'Commit to check out within the branch', DEFAULT_COMMIT)
      .option('--clear-cached <flag>', 'Delete compiled cache files afterwards', 't')
  ).action(withErrorHandler(async (options: SyncCommandOptions) => {
    const clearCached = parseFlag(options.clearCached);

    await runOnHosts(options, ({ code }) =>
      code.sync({ branch: options.branch, commit: options.commit, clearCached })
    );
  }));
}
