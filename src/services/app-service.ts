/**
 * App Service
 *
 * Service lifecycle tasks for one host. Enabling and disabling toggle the
 * health marker file and, when asked to wait, block until the host's load
 * balancers have rolled it in or out.
 */

import { HEALTH_FILE_CONTENT } from '../constants';
import type { Settings } from '../types';
import { withSpinner } from '../utils/spinner';
import type { CodeService, SyncOptions } from './code-service';
import type { HealthService, WaitResult } from './health-service';
import type { RemoteExecutor } from './remote-executor';

/**
 * Seconds to wait on the load balancers (0 checks once), or undefined to
 * skip the health check
 */
export type WaitSecs = number | undefined;

export interface StartOptions {
  skipEnable?: boolean;
  wait?: WaitSecs;
}

export interface StopOptions {
  skipDisable?: boolean;
  wait?: WaitSecs;
}

export interface UpOptions extends Omit<SyncOptions, 'clearCached'> {
  restart?: boolean;
  wait?: WaitSecs;
}

function describeWait(result: WaitResult): string {
  if (result.loadBalancers.length === 0) {
    return `${result.host}: no load balancers to wait on`;
  }
  return `${result.host}: ${result.loadBalancers.join(', ')} (${result.polls} poll${result.polls === 1 ? '' : 's'})`;
}

export class AppService {
  constructor(
    private readonly executor: RemoteExecutor,
    private readonly health: HealthService,
    private readonly code: CodeService,
    private readonly settings: Settings,
    private readonly appName: string
  ) {}

  async start(options: StartOptions = {}): Promise<void> {
    await this.executor.run(`service ${this.appName} start; sleep ${this.settings.timing.startupDelaySecs}`);
    if (!options.skipEnable) {
      await this.enable(options.wait);
    }
  }

  async stop(options: StopOptions = {}): Promise<void> {
    if (!options.skipDisable) {
      await this.disable(options.wait);
    }
    await this.executor.run(`service ${this.appName} stop`);
  }

  async reload(): Promise<void> {
    await this.executor.run(`service ${this.appName} reload`);
  }

  async restart(wait?: WaitSecs): Promise<void> {
    await this.disable(wait);
    await this.executor.run(`service ${this.appName} restart; sleep ${this.settings.timing.startupDelaySecs}`);
    await this.enable(wait);
  }

  /**
   * Declare the host healthy, then wait for it to roll into its load balancers
   */
  async enable(wait?: WaitSecs): Promise<void> {
    const file = this.settings.remote.healthFile;
    await this.executor.run(`echo -n "${HEALTH_FILE_CONTENT}" > ${file}`);

    if (wait !== undefined) {
      await withSpinner(
        `Waiting for ${this.executor.host} to be InService`,
        (spinner) => this.health.waitInService(this.executor.host, wait, {
          onPoll: (pending) => { spinner.text = `Waiting for ${this.executor.host} to be InService on ${pending.join(', ')}`; },
        }),
        describeWait
      );
    }
  }

  /**
   * Declare the host unhealthy, then wait for it to drop out of its load balancers
   */
  async disable(wait?: WaitSecs): Promise<void> {
    const file = this.settings.remote.healthFile;
    await this.executor.run(`[ ! -f ${file} ] || rm ${file}`);

    if (wait !== undefined) {
      await withSpinner(
        `Waiting for ${this.executor.host} to be OutOfService`,
        (spinner) => this.health.waitOutOfService(this.executor.host, wait, {
          onPoll: (pending) => { spinner.text = `Waiting for ${this.executor.host} to be OutOfService on ${pending.join(', ')}`; },
        }),
        describeWait
      );
    }
  }

  async status(): Promise<void> {
    await this.code.stat();
    await this.executor.run(`service ${this.appName} status`, { warnOnly: true });
    await this.executor.run(`curl -sS ${this.settings.remote.healthUrl}`, { warnOnly: true });
  }

  /**
   * Sync the code, then restart (or reload) and report status
   */
  async up(options: UpOptions = {}): Promise<void> {
    await this.code.sync({ branch: options.branch, commit: options.commit });
    if (options.restart) {
      await this.restart(options.wait);
    } else {
      await this.reload();
    }
    await this.status();
  }

  /**
   * Fail when an interactive application shell is running on the host
   */
  async shells(): Promise<void> {
    await this.executor.runWithShellProfile(
      `[ -z "$(pgrep -f '${this.settings.remote.shellPattern}' -u ${this.settings.ssh.user})" ]`
    );
  }

  async migrate(): Promise<void> {
    await this.executor.runWithShellProfile('./scripts/migrate-db upgrade', { cwd: this.code.appDir });
  }
}
