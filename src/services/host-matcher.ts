/**
 * Host Matcher
 *
 * Maps the host string of a remote session (hostname, IP, or a DNS name
 * derived from either) back to its inventory instance and load balancers.
 */

import { NAME_TAG } from '../constants';
import type { Instance, LoadBalancer } from '../types';
import type { InventoryService } from './inventory-service';

/**
 * Whether an instance is the one behind a host string. Checked in order:
 * Name tag prefix, private address prefix, dashed private address anywhere.
 */
export function instanceMatchesHost(instance: Instance, hostString: string): boolean {
  const name = instance.tags[NAME_TAG];
  if (name && hostString.startsWith(name)) {
    return true;
  }
  if (hostString.startsWith(instance.privateAddress)) {
    return true;
  }
  return hostString.includes(instance.privateAddress.replace(/\./g, '-'));
}

/**
 * First instance behind the host string, in inventory order
 */
export function matchInstance(instances: readonly Instance[], hostString: string): Instance | undefined {
  return instances.find((instance) => instanceMatchesHost(instance, hostString));
}

export class HostMatcher {
  constructor(private readonly inventory: InventoryService) {}

  /**
   * The inventory instance behind a host string, or undefined when none matches
   */
  async currentInstance(hostString: string): Promise<Instance | undefined> {
    const instances = await this.inventory.listInstances();
    return matchInstance(instances, hostString);
  }

  /**
   * Load balancers the instance is registered with
   */
  async loadBalancersFor(instance: Instance): Promise<LoadBalancer[]> {
    const loadBalancers = await this.inventory.listLoadBalancers();
    return loadBalancers.filter((lb) => lb.instanceIds.includes(instance.id));
  }
}
