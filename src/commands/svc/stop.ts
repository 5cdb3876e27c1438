/**
 * svc stop - Drain the host from its load balancers and stop the service
 */

import type { Command } from 'commander';
import type { SelectionOptions } from '../../services/selection';
import { withErrorHandler } from '../../utils/errors';
import { parseFlag, parseWait } from '../../utils/flags';
import { addSelectionOptions, createTaskContext, runOnHosts } from '../context';

interface StopCommandOptions extends SelectionOptions {
  skipDisable: string;
  wait: string;
}

export function registerSvcStopCommand(parent: Command): void {
  addSelectionOptions(
    parent
      .command('stop')
      .description('Disable the service, then stop it')
      .option('--skip-disable <flag>', 'Stop without draining the host first', 'f')
      .option('--wait <flag|secs>', 'Wait for the load balancers (flag or timeout in seconds)', 't')
  ).action(withErrorHandler(async (options: StopCommandOptions) => {
    const context = createTaskContext();
    const skipDisable = parseFlag(options.skipDisable);
    const wait = parseWait(options.wait, context.settings.timing.waitTimeoutSecs);

    await runOnHosts(options, ({ app }) => app.stop({ skipDisable, wait }), context);
  }));
}
