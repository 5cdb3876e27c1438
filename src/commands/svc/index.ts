/**
 * Service commands - Control the application service on the selected hosts
 */

import type { Command } from 'commander';
import { registerSvcStartCommand } from './start';
import { registerSvcStopCommand } from './stop';
import { registerSvcReloadCommand } from './reload';
import { registerSvcRestartCommand } from './restart';
import { registerSvcEnableCommand } from './enable';
import { registerSvcDisableCommand } from './disable';
import { registerSvcStatusCommand } from './status';
import { registerSvcUpCommand } from './up';

/**
 * Register all service commands under 'fleetdeploy svc <cmd>'
 */
export function registerSvcCommands(program: Command): void {
  const svc = program
    .command('svc')
    .description('Start, stop and roll the application service behind its load balancers');

  registerSvcStartCommand(svc);
  registerSvcStopCommand(svc);
  registerSvcReloadCommand(svc);
  registerSvcRestartCommand(svc);
  registerSvcEnableCommand(svc);
  registerSvcDisableCommand(svc);
  registerSvcStatusCommand(svc);
  registerSvcUpCommand(svc);
}
