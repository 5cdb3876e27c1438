/**
 * svc reload - Reload the service in place
 */

import type { Command } from 'commander';
import type { SelectionOptions } from '../../services/selection';
import { withErrorHandler } from '../../utils/errors';
import { addSelectionOptions, runOnHosts } from '../context';

export function registerSvcReloadCommand(parent: Command): void {
  addSelectionOptions(
    parent
      .command('reload')
      .description('Reload the service')
  ).action(withErrorHandler(async (options: SelectionOptions) => {
    await runOnHosts(options, ({ app }) => app.reload());
  }));
}
