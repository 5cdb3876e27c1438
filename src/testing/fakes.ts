/**
 * In-memory stand-ins for the cloud inventory, the clock and the remote
 * executor, shared by the service tests.
 */

import { FleetConfigSchema, type FleetConfigInput } from '../schemas/config.schema';
import type { Clock } from '../services/health-service';
import type { RemoteExecutor, RunOptions } from '../services/remote-executor';
import type {
  HealthRecord,
  Instance,
  InventoryProvider,
  LoadBalancerRecord,
  SSHExecResult,
  Settings,
} from '../types';
import { buildSettings } from '../utils/config';
import { RemoteCommandError } from '../utils/errors';

export function makeSettings(config: Partial<FleetConfigInput> = {}): Settings {
  return buildSettings(
    FleetConfigSchema.parse({
      app_name: 'shop',
      aws: { vpc_id: 'vpc-0abc' },
      ...config,
    }),
    {}
  );
}

export function makeInstance(overrides: Partial<Instance> & Pick<Instance, 'id' | 'privateAddress'>): Instance {
  return {
    tags: {},
    subnetId: 'subnet-0a1',
    ...overrides,
  };
}

export function health(...states: string[]): HealthRecord[] {
  return states.map((state) => ({ instanceId: 'i-any', state }));
}

/**
 * Health answers per load balancer: a fixed list, or one list per poll
 * (the last one repeats once the sequence runs out)
 */
export type HealthScript = HealthRecord[] | HealthRecord[][];

function isSequence(script: HealthScript): script is HealthRecord[][] {
  return script.length > 0 && Array.isArray(script[0]);
}

export class FakeInventoryProvider implements InventoryProvider {
  readonly instanceQueries: Record<string, string>[] = [];
  readonly healthQueries: Array<{ loadBalancer: string; instanceId: string }> = [];
  loadBalancerQueries = 0;

  private readonly health = new Map<string, HealthScript>();

  constructor(
    public instances: Instance[] = [],
    public loadBalancers: LoadBalancerRecord[] = []
  ) {}

  setHealth(loadBalancer: string, script: HealthScript): this {
    this.health.set(loadBalancer, script);
    return this;
  }

  async describeInstances(filters: Record<string, string>): Promise<Instance[]> {
    this.instanceQueries.push(filters);
    return this.instances;
  }

  async describeLoadBalancers(): Promise<LoadBalancerRecord[]> {
    this.loadBalancerQueries++;
    return this.loadBalancers;
  }

  async describeInstanceHealth(loadBalancer: string, instanceId: string): Promise<HealthRecord[]> {
    const previous = this.healthQueries.filter((query) => query.loadBalancer === loadBalancer).length;
    this.healthQueries.push({ loadBalancer, instanceId });

    const script = this.health.get(loadBalancer) ?? [];
    if (!isSequence(script)) {
      return script;
    }
    return script[Math.min(previous, script.length - 1)];
  }

  healthQueriesFor(loadBalancer: string): number {
    return this.healthQueries.filter((query) => query.loadBalancer === loadBalancer).length;
  }
}

/**
 * Clock whose sleeps advance time instantly
 */
export class FakeClock implements Clock {
  readonly sleeps: number[] = [];

  constructor(private current = 0) {}

  now(): number {
    return this.current;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.current += ms;
  }
}

export interface RecordedCommand {
  command: string;
  cwd?: string;
  warnOnly?: boolean;
  profile: boolean;
}

/**
 * Executor that records commands instead of running them
 */
export class RecordingExecutor implements RemoteExecutor {
  readonly commands: RecordedCommand[] = [];
  private readonly outputs = new Map<string, SSHExecResult>();

  constructor(readonly host = '10.0.1.5') {}

  respond(command: string, result: Partial<SSHExecResult>): this {
    this.outputs.set(command, { stdout: '', stderr: '', exitCode: 0, ...result });
    return this;
  }

  async run(command: string, options: RunOptions = {}): Promise<SSHExecResult> {
    return this.record(command, options, false);
  }

  async runWithShellProfile(command: string, options: RunOptions = {}): Promise<SSHExecResult> {
    return this.record(command, options, true);
  }

  get lines(): string[] {
    return this.commands.map((entry) => entry.command);
  }

  private record(command: string, options: RunOptions, profile: boolean): SSHExecResult {
    this.commands.push({ command, cwd: options.cwd, warnOnly: options.warnOnly, profile });
    const result = this.outputs.get(command) ?? { stdout: '', stderr: '', exitCode: 0 };
    if (result.exitCode !== 0 && !options.warnOnly) {
      throw new RemoteCommandError(this.host, command, result.exitCode, result.stderr);
    }
    return result;
  }
}
