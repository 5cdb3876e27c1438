/**
 * Hosts command - Show which hosts a selection resolves to
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import { NAME_TAG } from '../constants';
import { assertExclusiveSelection, parseHostList, selectInstances, type SelectionOptions } from '../services/selection';
import type { Instance } from '../types';
import { CLIError, ErrorCode, withErrorHandler } from '../utils/errors';
import { printBlank, printInfo, printRaw, printWarning } from '../utils/output';
import { addSelectionOptions, createTaskContext } from './context';

function printInstance(instance: Instance): void {
  const name = instance.tags[NAME_TAG] ?? '';
  printRaw(`  ${chalk.bold(instance.privateAddress.padEnd(16))} ${instance.id.padEnd(20)} ${chalk.gray(name)}`);

  const tags = Object.entries(instance.tags)
    .filter(([key]) => key !== NAME_TAG)
    .map(([key, value]) => `${key}=${value}`);
  if (tags.length > 0) {
    printRaw(chalk.gray(`    ${tags.join(' ')}`));
  }
}

export function registerHostsCommand(program: Command): void {
  addSelectionOptions(
    program
      .command('hosts')
      .alias('who')
      .description('List the hosts a selection resolves to')
      .option('--include-disabled', 'Also list instances carrying the disabled tag')
  ).action(withErrorHandler(async (options: SelectionOptions) => {
    assertExclusiveSelection(options);
    const context = createTaskContext();

    if (options.hosts !== undefined) {
      const hosts = parseHostList(options.hosts);
      printBlank();
      for (const host of hosts) {
        const instance = await context.matcher.currentInstance(host);
        if (instance) {
          printInstance(instance);
        } else {
          printWarning(`${host}: not in the inventory`);
        }
      }
      printBlank();
      return;
    }

    const instances = await selectInstances(context.inventory, context.settings, options);
    if (instances.length === 0) {
      throw new CLIError('No hosts selected', ErrorCode.NO_HOSTS_SELECTED);
    }

    printBlank();
    printInfo(`${instances.length} host${instances.length === 1 ? '' : 's'} selected`);
    printBlank();
    for (const instance of instances) {
      printInstance(instance);
    }
    printBlank();
  }));
}
