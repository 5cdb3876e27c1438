/**
 * Config command - Display and validate project configuration
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import { CONFIG_PATH } from '../constants';
import { printValidationReport, validateConfig } from '../schemas';
import { loadSettings, readConfigFile } from '../utils/config';
import { CLIError, ErrorCode, withErrorHandler } from '../utils/errors';
import { printBlank, printKeyValue, printSection } from '../utils/output';

function list(values: readonly string[]): string {
  return values.length > 0 ? values.join(', ') : chalk.gray('(any)');
}

export function registerConfigCommand(program: Command): void {
  const configCmd = program
    .command('config')
    .description('Display and validate project configuration');

  // config show (default)
  configCmd
    .command('show', { isDefault: true })
    .description('Display the effective settings')
    .option('--json', 'Output as JSON')
    .action(withErrorHandler(async (options: { json?: boolean }) => {
      const settings = loadSettings();

      if (options.json) {
        const { privateKey, ...ssh } = settings.ssh;
        console.log(JSON.stringify({ ...settings, ssh: { ...ssh, privateKey: privateKey ? '(set)' : undefined } }, null, 2));
        return;
      }

      printSection('Application');
      printKeyValue('  App name', settings.appName ?? chalk.yellow('not configured'));

      printSection('Inventory');
      printKeyValue('  Region', settings.aws.region);
      printKeyValue('  VPC', settings.aws.vpcId);
      if (settings.aws.groupId) {
        printKeyValue('  Security group', settings.aws.groupId);
      }
      printKeyValue('  Environment tag', settings.aws.environmentTag);
      printKeyValue('  Disabled tag', settings.aws.disabledTag);
      printKeyValue('  API subnets', list(settings.aws.apiSubnetIds));
      printKeyValue('  Worker subnets', list(settings.aws.workerSubnetIds));

      printSection('SSH');
      printKeyValue('  User', settings.ssh.user);
      printKeyValue('  Port', String(settings.ssh.port));
      printKeyValue('  Private key', settings.ssh.privateKey ? 'from environment' : 'agent / ~/.ssh');

      printSection('Timing');
      printKeyValue('  Startup delay', `${settings.timing.startupDelaySecs}s`);
      printKeyValue('  Wait timeout', `${settings.timing.waitTimeoutSecs}s`);
      printKeyValue('  Poll interval', `${settings.timing.pollIntervalSecs}s`);

      printSection('Remote');
      printKeyValue('  Health file', settings.remote.healthFile);
      printKeyValue('  Health URL', settings.remote.healthUrl);
      printBlank();
    }));

  // config validate
  configCmd
    .command('validate')
    .description(`Validate ${CONFIG_PATH}`)
    .action(withErrorHandler(async () => {
      const raw = readConfigFile();
      const result = raw === null ? null : validateConfig(raw);

      printValidationReport(CONFIG_PATH, result);

      if (!result) {
        throw new CLIError(`${CONFIG_PATH} not found`, ErrorCode.CONFIG_NOT_FOUND);
      }
      if (!result.success) {
        throw new CLIError(
          `${CONFIG_PATH} has ${result.error.length} error(s)`,
          ErrorCode.VALIDATION_FAILED
        );
      }
    }));
}
