/**
 * svc start - Start the service and roll the host into its load balancers
 */

import type { Command } from 'commander';
import type { SelectionOptions } from '../../services/selection';
import { withErrorHandler } from '../../utils/errors';
import { parseFlag, parseWait } from '../../utils/flags';
import { addSelectionOptions, createTaskContext, runOnHosts } from '../context';

interface StartCommandOptions extends SelectionOptions {
  skipEnable: string;
  wait: string;
}

export function registerSvcStartCommand(parent: Command): void {
  addSelectionOptions(
    parent
      .command('start')
      .description('Start the service, then enable it')
      .option('--skip-enable <flag>', 'Leave the host disabled', 'f')
      .option('--wait <flag|secs>', 'Wait for the load balancers (flag or timeout in seconds)', 't')
  ).action(withErrorHandler(async (options: StartCommandOptions) => {
    const context = createTaskContext();
    const skipEnable = parseFlag(options.skipEnable);
    const wait = parseWait(options.wait, context.settings.timing.waitTimeoutSecs);

    await runOnHosts(options, ({ app }) => app.start({ skipEnable, wait }), context);
  }));
}
