/**
 * svc up - Sync code, then reload or restart
 */

import type { Command } from 'commander';
import { DEFAULT_BRANCH, DEFAULT_COMMIT } from '../../constants';
import type { SelectionOptions } from '../../services/selection';
import { withErrorHandler } from '../../utils/errors';
import { parseFlag, parseWait } from '../../utils/flags';
import { addSelectionOptions, createTaskContext, runOnHosts } from '../context';

interface UpCommandOptions extends SelectionOptions {
  branch: string;
  commit: string;
  restart: string;
  wait: string;
}

export function registerSvcUpCommand(parent: Command): void {
  addSelectionOptions(
    parent
      .command('up')
      .description('Check out code, then reload (or restart) the service')
      .option('-b, --branch <branch>', 'Branch to check out', DEFAULT_BRANCH)
      .option('-c, --commit <commit>', 'Commit to check out within the branch', DEFAULT_COMMIT)
      .option('--restart <flag>', 'Restart instead of reload', 'f')
      .option('--wait <flag|secs>', 'Wait for the load balancers when restarting', 't')
  ).action(withErrorHandler(async (options: UpCommandOptions) => {
    const context = createTaskContext();
    const restart = parseFlag(options.restart);
    const wait = parseWait(options.wait, context.settings.timing.waitTimeoutSecs);

    await runOnHosts(
      options,
      ({ app }) => app.up({ branch: options.branch, commit: options.commit, restart, wait }),
      context
    );
  }));
}
