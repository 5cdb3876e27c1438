/**
 * Cloud inventory type definitions
 *
 * Snapshots of compute instances and load balancers as seen by one CLI run.
 */

/**
 * Tag mapping of an instance
 */
export type Tags = Record<string, string>;

/**
 * A running compute instance
 */
export interface Instance {
  /** Provider instance identifier (e.g. i-0abc...) */
  id: string;
  /** Private network address */
  privateAddress: string;
  /** Tag mapping */
  tags: Tags;
  /** Subnet the instance lives in */
  subnetId: string;
}

/**
 * A load balancer with its registered members
 */
export interface LoadBalancer {
  /** Name, unique within a region */
  name: string;
  /** Member instance identifiers, in provider order */
  instanceIds: string[];
}

/**
 * Load balancer as reported by the provider. Members are absent while the
 * load balancer is still being provisioned.
 */
export interface LoadBalancerRecord {
  name: string;
  instanceIds?: string[];
}

/**
 * Health state reported by a load balancer for one instance
 */
export type HealthState = 'InService' | 'OutOfService' | (string & {});

/**
 * Per-instance health entry
 */
export interface HealthRecord {
  instanceId: string;
  state: HealthState;
  reasonCode?: string;
  description?: string;
}

/**
 * Host selection filters
 */
export interface SelectionCriteria {
  /** Environment tag value (prod, test, stage, dev...) */
  environment?: string;
  /** Keep only members of this load balancer */
  loadBalancer?: LoadBalancer;
  /** Subnet allow-list, ignored when empty */
  subnetIds?: readonly string[];
  /** Drop instances carrying the disabled tag (default: true) */
  excludeDisabled?: boolean;
}

/**
 * Cloud inventory API boundary
 */
export interface InventoryProvider {
  /** List running instances matching provider-side filters */
  describeInstances(filters: Record<string, string>): Promise<Instance[]>;
  /** List all load balancers */
  describeLoadBalancers(): Promise<LoadBalancerRecord[]>;
  /** Health of one instance on one load balancer (empty when not registered) */
  describeInstanceHealth(loadBalancerName: string, instanceId: string): Promise<HealthRecord[]>;
}
