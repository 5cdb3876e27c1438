/**
 * Inventory Service
 *
 * Per-run cache of the cloud inventory. Instances and load balancers are
 * fetched at most once per service instance; every filter and lookup works
 * on that snapshot. Create a new service (or call invalidate()) for a
 * fresh view.
 */

import type {
  HealthRecord,
  Instance,
  InventoryProvider,
  LoadBalancer,
  SelectionCriteria,
  Settings,
} from '../types';
import { NotFoundError } from '../utils/errors';
import { printDebug } from '../utils/output';

/**
 * Provider-side filters for a selection: fixed network scope, running
 * state, and the environment tag when one is given.
 */
export function buildInstanceFilters(
  settings: Pick<Settings, 'aws'>,
  criteria: Pick<SelectionCriteria, 'environment'> = {}
): Record<string, string> {
  const filters: Record<string, string> = {
    'vpc-id': settings.aws.vpcId,
    'instance-state-name': 'running',
  };

  if (settings.aws.groupId) {
    filters['instance.group-id'] = settings.aws.groupId;
  }

  if (criteria.environment) {
    filters[`tag:${settings.aws.environmentTag}`] = criteria.environment;
  }

  return filters;
}

/**
 * Local filters, applied in order: subnet allow-list, disabled tag,
 * load balancer membership.
 */
export function filterInstances(
  instances: readonly Instance[],
  criteria: SelectionCriteria,
  disabledTag: string
): Instance[] {
  const { subnetIds = [], excludeDisabled = true, loadBalancer } = criteria;
  const members = loadBalancer ? new Set(loadBalancer.instanceIds) : undefined;

  return instances.filter((instance) => {
    if (subnetIds.length > 0 && !subnetIds.includes(instance.subnetId)) {
      return false;
    }
    if (excludeDisabled && Object.hasOwn(instance.tags, disabledTag)) {
      return false;
    }
    if (members) {
      return members.has(instance.id);
    }
    return true;
  });
}

export class InventoryService {
  private instances?: Promise<Instance[]>;
  private loadBalancers?: Promise<LoadBalancer[]>;

  constructor(
    private readonly provider: InventoryProvider,
    private readonly settings: Settings
  ) {}

  /**
   * Running instances matching the criteria.
   * The first call populates the cache; later calls return the cached
   * snapshot and ignore their criteria until invalidate().
   */
  listInstances(criteria: SelectionCriteria = {}): Promise<Instance[]> {
    if (!this.instances) {
      this.instances = this.fetchInstances(criteria).catch((error: unknown) => {
        this.instances = undefined;
        throw error;
      });
    }
    return this.instances;
  }

  /**
   * Load balancers with a known membership list
   */
  listLoadBalancers(): Promise<LoadBalancer[]> {
    if (!this.loadBalancers) {
      this.loadBalancers = this.fetchLoadBalancers().catch((error: unknown) => {
        this.loadBalancers = undefined;
        throw error;
      });
    }
    return this.loadBalancers;
  }

  /**
   * Resolve a load balancer by its exact name
   */
  async resolveByName(name: string): Promise<LoadBalancer> {
    const loadBalancers = await this.listLoadBalancers();
    const match = loadBalancers.find((lb) => lb.name === name);

    if (!match) {
      throw new NotFoundError(name, loadBalancers.map((lb) => lb.name));
    }

    return match;
  }

  /**
   * Fresh health of one instance on one load balancer (never cached)
   */
  instanceHealth(loadBalancerName: string, instanceId: string): Promise<HealthRecord[]> {
    return this.provider.describeInstanceHealth(loadBalancerName, instanceId);
  }

  /**
   * Drop both caches
   */
  invalidate(): void {
    this.instances = undefined;
    this.loadBalancers = undefined;
  }

  private async fetchInstances(criteria: SelectionCriteria): Promise<Instance[]> {
    const described = await this.provider.describeInstances(buildInstanceFilters(this.settings, criteria));
    const selected = filterInstances(described, criteria, this.settings.aws.disabledTag);

    printDebug('Instances selected', { described: described.length, selected: selected.length });

    return selected;
  }

  private async fetchLoadBalancers(): Promise<LoadBalancer[]> {
    const records = await this.provider.describeLoadBalancers();
    const loadBalancers: LoadBalancer[] = [];

    for (const record of records) {
      if (record.instanceIds) {
        loadBalancers.push({ name: record.name, instanceIds: record.instanceIds });
      } else {
        printDebug('Skipping load balancer without members', { name: record.name });
      }
    }

    return loadBalancers;
  }
}
