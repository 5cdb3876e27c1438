/**
 * Shared wiring for task commands: settings, inventory, per-host services
 */

import { Option, type Command } from 'commander';
import {
  AppService,
  AwsInventoryProvider,
  CodeService,
  HealthService,
  HostMatcher,
  InventoryService,
  createRemoteExecutor,
  selectHosts,
  type RemoteExecutor,
  type SelectionOptions,
} from '../services';
import type { InventoryProvider, Settings } from '../types';
import { loadSettings, requireAppName } from '../utils/config';
import { printSection, printSuccess } from '../utils/output';

export interface TaskContext {
  settings: Settings;
  inventory: InventoryService;
  matcher: HostMatcher;
  health: HealthService;
}

export interface HostServices {
  host: string;
  executor: RemoteExecutor;
  code: CodeService;
  app: AppService;
}

export function createTaskContext(
  settings: Settings = loadSettings(),
  provider: InventoryProvider = new AwsInventoryProvider(settings.aws.region)
): TaskContext {
  const inventory = new InventoryService(provider, settings);
  const matcher = new HostMatcher(inventory);
  const health = new HealthService(inventory, matcher, settings);
  return { settings, inventory, matcher, health };
}

export function createHostServices(
  context: TaskContext,
  host: string,
  executor: RemoteExecutor
): HostServices {
  const appName = requireAppName(context.settings);
  const code = new CodeService(executor, context.settings, appName);
  const app = new AppService(executor, context.health, code, context.settings, appName);
  return { host, executor, code, app };
}

/**
 * Add the host selection options shared by every task command
 */
export function addSelectionOptions(command: Command): Command {
  return command
    .option('-e, --env <env>', 'Select instances tagged with this environment')
    .option('--lb <name>', 'Select instances registered with this load balancer')
    .option('-H, --hosts <list>', 'Comma separated explicit hosts')
    .addOption(new Option('--role <role>', 'Restrict to the subnets of a host role').choices(['api', 'worker']));
}

/**
 * Select hosts and run a task on each, one after another.
 * The first failure stops the run.
 */
export async function runOnHosts(
  selection: SelectionOptions,
  task: (services: HostServices) => Promise<void>,
  context: TaskContext = createTaskContext(),
  connect: (host: string) => RemoteExecutor = (host) => createRemoteExecutor(host, context.settings)
): Promise<void> {
  requireAppName(context.settings);
  const hosts = await selectHosts(context.inventory, context.settings, selection);

  for (const host of hosts) {
    printSection(host);
    await task(createHostServices(context, host, connect(host)));
  }

  printSuccess(`Done on ${hosts.length} host${hosts.length === 1 ? '' : 's'}`);
}
