/**
 * svc restart - Hard restart behind a drain and refill
 */

import type { Command } from 'commander';
import type { SelectionOptions } from '../../services/selection';
import { withErrorHandler } from '../../utils/errors';
import { parseWait } from '../../utils/flags';
import { addSelectionOptions, createTaskContext, runOnHosts } from '../context';

interface RestartCommandOptions extends SelectionOptions {
  wait: string;
}

export function registerSvcRestartCommand(parent: Command): void {
  addSelectionOptions(
    parent
      .command('restart')
      .description('Disable, restart and re-enable the service')
      .option('--wait <flag|secs>', 'Wait for the load balancers (flag or timeout in seconds)', 't')
  ).action(withErrorHandler(async (options: RestartCommandOptions) => {
    const context = createTaskContext();
    const wait = parseWait(options.wait, context.settings.timing.waitTimeoutSecs);

    await runOnHosts(options, ({ app }) => app.restart(wait), context);
  }));
}
