/**
 * Health Service
 *
 * Gates service enable/disable on load balancer health: polls every load
 * balancer an instance belongs to until each reports the wanted state, or
 * fails once the deadline has passed.
 */

import type { HealthRecord, Settings } from '../types';
import { WaitTimeoutError } from '../utils/errors';
import { printDebug, printWarning } from '../utils/output';
import { sleep } from '../utils/time';
import type { HostMatcher } from './host-matcher';
import type { InventoryService } from './inventory-service';

/**
 * Predicate over the health records one load balancer returns for one instance
 */
export type HealthCondition = (records: readonly HealthRecord[]) => boolean;

/**
 * Registered and reported InService. An instance the load balancer does
 * not report at all is not in service.
 */
export const inService: HealthCondition = (records) =>
  records.length > 0 && records[0].state === 'InService';

/**
 * Reported OutOfService, or not reported at all.
 */
export const outOfService: HealthCondition = (records) =>
  records.length === 0 || records[0].state === 'OutOfService';

/**
 * Time source for the wait loop
 */
export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep,
};

export interface WaitOptions {
  /** Called before each sleep with the names still pending */
  onPoll?: (pending: readonly string[]) => void;
}

export interface WaitResult {
  host: string;
  /** Matched instance, undefined when the host is not in the inventory */
  instanceId?: string;
  /** Load balancers that were waited on */
  loadBalancers: string[];
  /** Number of poll cycles */
  polls: number;
}

export class HealthService {
  constructor(
    private readonly inventory: InventoryService,
    private readonly matcher: HostMatcher,
    private readonly settings: Settings,
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * Wait until every load balancer of the host reports it InService
   */
  waitInService(host: string, timeoutSecs: number, options?: WaitOptions): Promise<WaitResult> {
    return this.waitFor(host, timeoutSecs, inService, options);
  }

  /**
   * Wait until every load balancer of the host reports it OutOfService (or forgets it)
   */
  waitOutOfService(host: string, timeoutSecs: number, options?: WaitOptions): Promise<WaitResult> {
    return this.waitFor(host, timeoutSecs, outOfService, options);
  }

  /**
   * Poll until the condition holds on every load balancer of the host.
   * A timeout of 0 checks once. Satisfied load balancers are not polled again.
   */
  async waitFor(
    host: string,
    timeoutSecs: number,
    condition: HealthCondition,
    options: WaitOptions = {}
  ): Promise<WaitResult> {
    const instance = await this.matcher.currentInstance(host);
    if (!instance) {
      printWarning(`No inventory instance matches ${host}, skipping load balancer wait`);
      return { host, loadBalancers: [], polls: 0 };
    }

    const loadBalancers = (await this.matcher.loadBalancersFor(instance)).map((lb) => lb.name);
    const pending = new Set(loadBalancers);
    const deadline = this.clock.now() + timeoutSecs * 1000;
    let polls = 0;

    for (;;) {
      polls++;

      for (const name of [...pending]) {
        const records = await this.inventory.instanceHealth(name, instance.id);
        printDebug('Health polled', { host, loadBalancer: name, state: records[0]?.state ?? 'absent' });

        if (condition(records)) {
          pending.delete(name);
        }
      }

      if (pending.size === 0) {
        return { host, instanceId: instance.id, loadBalancers, polls };
      }

      if (this.clock.now() >= deadline) {
        throw new WaitTimeoutError(timeoutSecs, host, [...pending]);
      }

      options.onPoll?.([...pending]);
      await this.clock.sleep(this.settings.timing.pollIntervalSecs * 1000);
    }
  }
}
