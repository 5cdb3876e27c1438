/**
 * AWS inventory provider
 *
 * Reads running EC2 instances and Classic Load Balancers through the
 * AWS SDK. Credentials come from the SDK's default chain (environment,
 * shared config, instance profile).
 */

import {
  EC2Client,
  DescribeInstancesCommand,
  type Filter,
  type Instance as EC2Instance,
} from '@aws-sdk/client-ec2';
import {
  ElasticLoadBalancingClient,
  DescribeLoadBalancersCommand,
  DescribeInstanceHealthCommand,
} from '@aws-sdk/client-elastic-load-balancing';
import type {
  HealthRecord,
  Instance,
  InventoryProvider,
  LoadBalancerRecord,
  Tags,
} from '../types';
import { CLIError, ErrorCode } from '../utils/errors';
import { printDebug } from '../utils/output';

/** ELB answers with this error when the instance is not registered */
const UNREGISTERED_INSTANCE_ERRORS = new Set(['InvalidEndPointException', 'InvalidInstance']);

/**
 * Convert provider-side filters to the EC2 filter list
 */
export function toEc2Filters(filters: Record<string, string>): Filter[] {
  return Object.entries(filters).map(([name, value]) => ({ Name: name, Values: [value] }));
}

/**
 * Map an EC2 instance description to an inventory instance
 */
export function mapInstance(instance: EC2Instance): Instance | null {
  const privateAddress = instance.PrivateIpAddress ?? instance.NetworkInterfaces?.[0]?.PrivateIpAddress;

  if (!instance.InstanceId || !privateAddress) {
    return null;
  }

  const tags: Tags = {};
  for (const tag of instance.Tags ?? []) {
    if (tag.Key !== undefined) {
      tags[tag.Key] = tag.Value ?? '';
    }
  }

  return {
    id: instance.InstanceId,
    privateAddress,
    tags,
    subnetId: instance.SubnetId ?? '',
  };
}

function isUnregisteredInstanceError(error: unknown): boolean {
  return error instanceof Error && UNREGISTERED_INSTANCE_ERRORS.has(error.name);
}

function inventoryError(operation: string, error: unknown): CLIError {
  const cause = error instanceof Error ? error : new Error(String(error));
  return new CLIError(
    `${operation} failed: ${cause.message}`,
    ErrorCode.INVENTORY_FAILED,
    'Check the AWS credentials and region',
    cause
  );
}

export class AwsInventoryProvider implements InventoryProvider {
  private readonly ec2: EC2Client;
  private readonly elb: ElasticLoadBalancingClient;

  constructor(private readonly region: string) {
    this.ec2 = new EC2Client({ region });
    this.elb = new ElasticLoadBalancingClient({ region });
  }

  async describeInstances(filters: Record<string, string>): Promise<Instance[]> {
    const instances: Instance[] = [];
    let nextToken: string | undefined;

    printDebug('DescribeInstances', { region: this.region, filters });

    do {
      const response = await this.ec2.send(new DescribeInstancesCommand({
        Filters: toEc2Filters(filters),
        NextToken: nextToken,
      })).catch((error: unknown) => {
        throw inventoryError('DescribeInstances', error);
      });

      for (const reservation of response.Reservations ?? []) {
        for (const described of reservation.Instances ?? []) {
          const instance = mapInstance(described);
          if (instance) {
            instances.push(instance);
          } else {
            printDebug('Skipping instance without id or private address', { id: described.InstanceId });
          }
        }
      }

      nextToken = response.NextToken;
    } while (nextToken);

    return instances;
  }

  async describeLoadBalancers(): Promise<LoadBalancerRecord[]> {
    const loadBalancers: LoadBalancerRecord[] = [];
    let marker: string | undefined;

    printDebug('DescribeLoadBalancers', { region: this.region });

    do {
      const response = await this.elb.send(new DescribeLoadBalancersCommand({ Marker: marker }))
        .catch((error: unknown) => {
          throw inventoryError('DescribeLoadBalancers', error);
        });

      for (const description of response.LoadBalancerDescriptions ?? []) {
        if (!description.LoadBalancerName) continue;

        loadBalancers.push({
          name: description.LoadBalancerName,
          instanceIds: description.Instances
            ?.map((member) => member.InstanceId)
            .filter((id): id is string => typeof id === 'string'),
        });
      }

      marker = response.NextMarker;
    } while (marker);

    return loadBalancers;
  }

  async describeInstanceHealth(loadBalancerName: string, instanceId: string): Promise<HealthRecord[]> {
    try {
      const response = await this.elb.send(new DescribeInstanceHealthCommand({
        LoadBalancerName: loadBalancerName,
        Instances: [{ InstanceId: instanceId }],
      }));

      return (response.InstanceStates ?? []).map((state) => ({
        instanceId: state.InstanceId ?? instanceId,
        state: state.State ?? 'Unknown',
        reasonCode: state.ReasonCode,
        description: state.Description,
      }));
    } catch (error) {
      if (isUnregisteredInstanceError(error)) {
        printDebug('Instance not registered with load balancer', { loadBalancerName, instanceId });
        return [];
      }
      throw inventoryError('DescribeInstanceHealth', error);
    }
  }
}
