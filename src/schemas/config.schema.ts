/**
 * Schema validation for .deployment/config.yml
 * Uses Zod for runtime type checking and validation
 */

import { z } from 'zod';
import {
  DEFAULT_AWS_REGION,
  DEFAULT_CACHE_PATTERN,
  DEFAULT_DISABLED_TAG,
  DEFAULT_ENVIRONMENT_TAG,
  DEFAULT_HEALTH_FILE,
  DEFAULT_HEALTH_URL,
  DEFAULT_POLL_INTERVAL_SECS,
  DEFAULT_SHELL_PATTERN,
  DEFAULT_SSH_PORT,
  DEFAULT_SSH_TIMEOUT,
  DEFAULT_SSH_USER,
  DEFAULT_STARTUP_DELAY_SECS,
  DEFAULT_WAIT_TIMEOUT_SECS,
} from '../constants';

const SubnetIdsSchema = z.array(
  z.string().regex(/^subnet-[0-9a-f]+$/, 'Subnet ids look like "subnet-0123abcd"')
);

/**
 * AWS inventory scope schema
 */
export const AwsConfigSchema = z.object({
  region: z.string().min(1).optional().default(DEFAULT_AWS_REGION).describe(
    'AWS region holding the instances and load balancers'
  ),
  vpc_id: z.string()
    .regex(/^vpc-[0-9a-f]+$/, 'VPC ids look like "vpc-0123abcd"')
    .describe('Only instances in this VPC are ever selected'),
  group_id: z.string().optional().describe(
    'Optional security group every selected instance must belong to'
  ),
  environment_tag: z.string().min(1).optional().default(DEFAULT_ENVIRONMENT_TAG).describe(
    'Instance tag holding the environment name'
  ),
  disabled_tag: z.string().min(1).optional().default(DEFAULT_DISABLED_TAG).describe(
    'Instances carrying this tag are skipped'
  ),
  api_subnet_ids: SubnetIdsSchema.optional().default([]).describe('Subnets of API hosts'),
  worker_subnet_ids: SubnetIdsSchema.optional().default([]).describe('Subnets of worker hosts'),
});

/**
 * SSH settings schema
 */
export const SshConfigSchema = z.object({
  user: z.string().min(1).max(32).optional().default(DEFAULT_SSH_USER).describe('SSH user'),
  port: z.number().int().min(1).max(65535).optional().default(DEFAULT_SSH_PORT).describe('SSH port'),
  connect_timeout: z.number().int().min(1).max(300).optional().default(DEFAULT_SSH_TIMEOUT).describe(
    'SSH connect timeout in seconds'
  ),
});

/**
 * Timing schema (all values in seconds)
 */
export const TimingConfigSchema = z.object({
  startup_delay: z.number().int().min(0).optional().default(DEFAULT_STARTUP_DELAY_SECS).describe(
    'Pause after starting or restarting the service'
  ),
  wait_timeout: z.number().int().min(0).max(3600).optional().default(DEFAULT_WAIT_TIMEOUT_SECS).describe(
    'Default load balancer wait timeout'
  ),
  poll_interval: z.number().int().min(1).max(300).optional().default(DEFAULT_POLL_INTERVAL_SECS).describe(
    'Delay between load balancer health polls'
  ),
});

/**
 * Remote host layout schema
 */
export const RemoteConfigSchema = z.object({
  health_file: z.string().startsWith('/', 'health_file must be an absolute path').optional().default(DEFAULT_HEALTH_FILE),
  health_url: z.string().url().optional().default(DEFAULT_HEALTH_URL),
  cache_pattern: z.string().min(1).optional().default(DEFAULT_CACHE_PATTERN),
  shell_pattern: z.string().min(1).optional().default(DEFAULT_SHELL_PATTERN),
});

/**
 * Complete config.yml schema
 */
export const FleetConfigSchema = z.object({
  app_name: z.string()
    .regex(/^[a-z0-9][a-z0-9_-]*$/, 'app_name must be lowercase alphanumeric with hyphens or underscores')
    .optional()
    .describe('Name of the service and of its checkout directory on the hosts'),
  aws: AwsConfigSchema,
  ssh: SshConfigSchema.optional().default({}),
  timing: TimingConfigSchema.optional().default({}),
  remote: RemoteConfigSchema.optional().default({}),
});

/**
 * Type inference from schema
 */
export type FleetConfigInput = z.input<typeof FleetConfigSchema>;
export type FleetConfigOutput = z.output<typeof FleetConfigSchema>;
