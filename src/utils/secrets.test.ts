import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { isCI, loadSecrets, parseDotenv } from './secrets';
import { ConfigError } from './errors';

describe('parseDotenv', () => {
  it('reads key/value pairs, skipping comments and blank lines', () => {
    const content = [
      '# credentials',
      'AWS_ACCESS_KEY_ID=test-access-key',
      '',
      'AWS_SECRET_ACCESS_KEY = "test-secret"',
      "FLEETDEPLOY_SSH_USER='ops'",
      'not a pair',
    ].join('\n');

    expect(parseDotenv(content)).toEqual({
      AWS_ACCESS_KEY_ID: 'test-access-key',
      AWS_SECRET_ACCESS_KEY: 'test-secret',
      FLEETDEPLOY_SSH_USER: 'ops',
    });
  });

  it('keeps "=" inside values', () => {
    expect(parseDotenv('TOKEN=a=b')).toEqual({ TOKEN: 'a=b' });
  });
});

describe('isCI', () => {
  it('detects common CI variables', () => {
    expect(isCI({ GITHUB_ACTIONS: 'true' })).toBe(true);
    expect(isCI({})).toBe(false);
  });
});

describe('loadSecrets', () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'fleetdeploy-secrets-'));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('prefers the .env.fleetdeploy file', () => {
    writeFileSync(join(root, '.env.fleetdeploy'), 'AWS_REGION=eu-west-1\nEMPTY=\n');
    const env: NodeJS.ProcessEnv = { FLEETDEPLOY_SECRETS: '{"AWS_REGION":"us-east-1"}' };

    expect(loadSecrets(root, env)).toBe('.env.fleetdeploy');
    expect(env.AWS_REGION).toBe('eu-west-1');
    expect(env.EMPTY).toBeUndefined();
  });

  it('falls back to a JSON secrets file', () => {
    const file = join(root, 'secrets.json');
    writeFileSync(file, JSON.stringify({ FLEETDEPLOY_SSH_USER: 'ops', COUNT: 3 }));
    const env: NodeJS.ProcessEnv = { FLEETDEPLOY_SECRETS_FILE: file };

    expect(loadSecrets(root, env)).toBe(file);
    expect(env.FLEETDEPLOY_SSH_USER).toBe('ops');
    expect(env.COUNT).toBeUndefined();
  });

  it('reads the FLEETDEPLOY_SECRETS variable last', () => {
    const env: NodeJS.ProcessEnv = { FLEETDEPLOY_SECRETS: '{"AWS_REGION":"us-east-1"}' };

    expect(loadSecrets(root, env)).toBe('FLEETDEPLOY_SECRETS');
    expect(env.AWS_REGION).toBe('us-east-1');
  });

  it('returns null when no source exists', () => {
    expect(loadSecrets(root, {})).toBeNull();
  });

  it('rejects secrets that are not a JSON object', () => {
    expect(() => loadSecrets(root, { FLEETDEPLOY_SECRETS: '[1, 2]' })).toThrow(ConfigError);
    expect(() => loadSecrets(root, { FLEETDEPLOY_SECRETS: '{broken' })).toThrow(ConfigError);
  });
});
