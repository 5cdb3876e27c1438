/**
 * Host selection
 *
 * Turns the selection options of a task command (environment, load
 * balancer, role or an explicit host list) into the hosts to run on.
 */

import type { HostRole, Instance, Settings } from '../types';
import { CLIError, ErrorCode, ValidationError } from '../utils/errors';
import type { InventoryService } from './inventory-service';

export interface SelectionOptions {
  env?: string;
  lb?: string;
  /** Comma separated explicit hosts */
  hosts?: string;
  role?: HostRole;
  includeDisabled?: boolean;
}

/**
 * Split a comma separated host list
 */
export function parseHostList(raw: string): string[] {
  return raw
    .split(',')
    .map((host) => host.trim())
    .filter((host) => host.length > 0);
}

/**
 * An explicit host list excludes every inventory filter
 */
export function assertExclusiveSelection(options: SelectionOptions): void {
  if (options.hosts !== undefined && (options.env || options.lb || options.role)) {
    throw new ValidationError(
      '--hosts cannot be combined with --env, --lb or --role',
      'Pass either an explicit host list or inventory filters'
    );
  }
}

export function subnetsForRole(settings: Settings, role: HostRole | undefined): readonly string[] {
  switch (role) {
    case 'api':
      return settings.aws.apiSubnetIds;
    case 'worker':
      return settings.aws.workerSubnetIds;
    default:
      return [];
  }
}

/**
 * Instances selected from the inventory
 */
export async function selectInstances(
  inventory: InventoryService,
  settings: Settings,
  options: Omit<SelectionOptions, 'hosts'>
): Promise<Instance[]> {
  const loadBalancer = options.lb ? await inventory.resolveByName(options.lb) : undefined;

  return inventory.listInstances({
    environment: options.env,
    loadBalancer,
    subnetIds: subnetsForRole(settings, options.role),
    excludeDisabled: !options.includeDisabled,
  });
}

/**
 * Hosts to run a task on. Inventory hosts are addressed by private address.
 */
export async function selectHosts(
  inventory: InventoryService,
  settings: Settings,
  options: SelectionOptions
): Promise<string[]> {
  let hosts: string[];

  if (options.hosts !== undefined) {
    assertExclusiveSelection(options);
    hosts = parseHostList(options.hosts);
  } else {
    const instances = await selectInstances(inventory, settings, options);
    hosts = instances.map((instance) => instance.privateAddress);
  }

  if (hosts.length === 0) {
    throw new CLIError(
      'No hosts selected',
      ErrorCode.NO_HOSTS_SELECTED,
      'Check the --env, --lb and --role filters, or pass --hosts'
    );
  }

  return hosts;
}
