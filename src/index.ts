#!/usr/bin/env node

/**
 * fleetdeploy CLI - Main entry point
 * Rolls an application service across cloud hosts, gated on load balancer health
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { FLEETDEPLOY_VERSION } from './constants';
import { loadSecrets } from './utils/secrets';
import { handleError } from './utils/errors';
import { setDebug } from './utils/output';

// Commands
import { registerHostsCommand } from './commands/hosts';
import { registerSvcCommands } from './commands/svc';
import { registerCodeCommands } from './commands/code';
import { registerShellsCommand } from './commands/shells';
import { registerMigrateCommand } from './commands/migrate';
import { registerConfigCommand } from './commands/config';

const program = new Command();

program
  .name('fleetdeploy')
  .description('Roll an application service across cloud hosts behind their load balancers')
  .version(FLEETDEPLOY_VERSION, '-v, --version', 'Show version information')
  .option('--debug', 'Show debug output')
  .option('--no-color', 'Disable colored output');

program.hook('preAction', () => {
  if (program.opts<{ debug?: boolean }>().debug) {
    setDebug(true);
  }
});

// Register all commands
registerHostsCommand(program);
registerSvcCommands(program);
registerCodeCommands(program);
registerShellsCommand(program);
registerMigrateCommand(program);
registerConfigCommand(program);

// Default action (no command) - show quick help
program.action(() => {
  console.log(chalk.green('========================================================'));
  console.log(chalk.green(`   fleetdeploy v${FLEETDEPLOY_VERSION}`));
  console.log(chalk.green('========================================================'));
  console.log('');
  console.log(chalk.cyan('Run with --help to see available commands'));
  console.log('');
  console.log(chalk.yellow('Selection (any task command):'));
  console.log('  -e, --env <env>                 Instances tagged with an environment');
  console.log('  --lb <name>                     Instances behind a load balancer');
  console.log('  --role <api|worker>             Instances in the role\'s subnets');
  console.log('  -H, --hosts <a,b>               Explicit hosts');
  console.log('');
  console.log(chalk.yellow('Service:'));
  console.log('  fleetdeploy hosts -e prod             List selected hosts');
  console.log('  fleetdeploy svc up -e prod --restart t');
  console.log('  fleetdeploy svc disable --lb web --wait 120');
  console.log('  fleetdeploy svc status -H 10.0.1.5');
  console.log('');
  console.log(chalk.yellow('Code:'));
  console.log('  fleetdeploy code sync -b release   Check out a branch');
  console.log('  fleetdeploy code stat              Show <branch>:<commit>');
});

// Error handling
program.showHelpAfterError('(add --help for additional information)');

try {
  loadSecrets();
} catch (error) {
  handleError(error);
}

program.parseAsync(process.argv).catch(handleError);
