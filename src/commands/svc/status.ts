/**
 * svc status - Code revision, service status and health endpoint
 */

import type { Command } from 'commander';
import type { SelectionOptions } from '../../services/selection';
import { withErrorHandler } from '../../utils/errors';
import { addSelectionOptions, runOnHosts } from '../context';

export function registerSvcStatusCommand(parent: Command): void {
  addSelectionOptions(
    parent
      .command('status')
      .alias('stat')
      .description('Show code revision, service status and health')
  ).action(withErrorHandler(async (options: SelectionOptions) => {
    await runOnHosts(options, ({ app }) => app.status());
  }));
}
