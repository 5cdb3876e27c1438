/**
 * Code commands - Manage the application checkout on the selected hosts
 */

import type { Command } from 'commander';
import { registerCodeSyncCommand } from './sync';
import { registerCodeStatCommand } from './stat';

export function registerCodeCommands(program: Command): void {
  const code = program
    .command('code')
    .description('Manage the application checkout');

  registerCodeSyncCommand(code);
  registerCodeStatCommand(code);
}
