/**
 * svc enable - Mark the host healthy
 */

import type { Command } from 'commander';
import type { SelectionOptions } from '../../services/selection';
import { withErrorHandler } from '../../utils/errors';
import { parseWait } from '../../utils/flags';
import { addSelectionOptions, createTaskContext, runOnHosts } from '../context';

interface EnableCommandOptions extends SelectionOptions {
  wait: string;
}

export function registerSvcEnableCommand(parent: Command): void {
  addSelectionOptions(
    parent
      .command('enable')
      .description('Write the health marker and wait until the host is InService')
      .option('--wait <flag|secs>', 'Wait for the load balancers (flag or timeout in seconds)', 't')
  ).action(withErrorHandler(async (options: EnableCommandOptions) => {
    const context = createTaskContext();
    const wait = parseWait(options.wait, context.settings.timing.waitTimeoutSecs);

    await runOnHosts(options, ({ app }) => app.enable(wait), context);
  }));
}
