/**
 * Runtime settings shared by every service of one CLI run.
 *
 * Built once from .deployment/config.yml plus environment overrides and
 * frozen; services receive it through their constructors.
 */

export interface AwsSettings {
  region: string;
  /** Virtual network every selected instance must live in */
  vpcId: string;
  /** Optional security group every selected instance must belong to */
  groupId?: string;
  /** Tag whose value names the environment (prod, test, ...) */
  environmentTag: string;
  /** Tag marking an instance as disabled, whatever its value */
  disabledTag: string;
  /** Subnet allow-list for API hosts */
  apiSubnetIds: readonly string[];
  /** Subnet allow-list for worker hosts */
  workerSubnetIds: readonly string[];
}

export interface SshSettings {
  user: string;
  port: number;
  privateKey?: string;
  connectTimeoutSecs: number;
}

export interface TimingSettings {
  startupDelaySecs: number;
  waitTimeoutSecs: number;
  pollIntervalSecs: number;
}

export interface RemoteSettings {
  /** Marker file whose presence declares the service healthy */
  healthFile: string;
  /** Local health endpoint queried by `svc status` */
  healthUrl: string;
  /** Regex of compiled cache files removed by `code sync` */
  cachePattern: string;
  /** Process pattern of interactive application shells */
  shellPattern: string;
}

export interface Settings {
  appName?: string;
  aws: AwsSettings;
  ssh: SshSettings;
  timing: TimingSettings;
  remote: RemoteSettings;
}

/**
 * Host role, selecting which subnet allow-list applies
 */
export type HostRole = 'api' | 'worker';
