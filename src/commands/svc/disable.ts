/**
 * svc disable - Mark the host unhealthy
 */

import type { Command } from 'commander';
import type { SelectionOptions } from '../../services/selection';
import { withErrorHandler } from '../../utils/errors';
import { parseWait } from '../../utils/flags';
import { addSelectionOptions, createTaskContext, runOnHosts } from '../context';

interface DisableCommandOptions extends SelectionOptions {
  wait: string;
}

export function registerSvcDisableCommand(parent: Command): void {
  addSelectionOptions(
    parent
      .command('disable')
      .description('Remove the health marker and wait until the host is OutOfService')
      .option('--wait <flag|secs>', 'Wait for the load balancers (flag or timeout in seconds)', 't')
  ).action(withErrorHandler(async (options: DisableCommandOptions) => {
    const context = createTaskContext();
    const wait = parseWait(options.wait, context.settings.timing.waitTimeoutSecs);

    await runOnHosts(options, ({ app }) => app.disable(wait), context);
  }));
}
