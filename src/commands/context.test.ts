import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { FakeInventoryProvider, makeInstance, makeSettings, RecordingExecutor } from '../testing/fakes';
import { ConfigError } from '../utils/errors';
import { createTaskContext, runOnHosts } from './context';

describe('runOnHosts', () => {
  const provider = new FakeInventoryProvider([
    makeInstance({ id: 'i-1', privateAddress: '10.0.1.5' }),
    makeInstance({ id: 'i-2', privateAddress: '10.0.1.6' }),
  ]);

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('runs the task on each selected host in order', async () => {
    const executors: RecordingExecutor[] = [];
    const context = createTaskContext(makeSettings(), provider);

    await runOnHosts({}, ({ app }) => app.reload(), context, (host) => {
      const executor = new RecordingExecutor(host);
      executors.push(executor);
      return executor;
    });

    expect(executors.map((executor) => executor.host)).toEqual(['10.0.1.5', '10.0.1.6']);
    expect(executors.map((executor) => executor.lines)).toEqual([['service shop reload'], ['service shop reload']]);
  });

  it('stops at the first failing host', async () => {
    const hosts: string[] = [];
    const context = createTaskContext(makeSettings(), provider);

    await expect(runOnHosts({}, async ({ host }) => {
      hosts.push(host);
      throw new Error(`boom on ${host}`);
    }, context, (host) => new RecordingExecutor(host))).rejects.toThrow('boom on 10.0.1.5');

    expect(hosts).toEqual(['10.0.1.5']);
  });

  it('requires an app name before selecting hosts', async () => {
    const context = createTaskContext(makeSettings({ app_name: undefined }), provider);

    await expect(runOnHosts({ hosts: '10.0.1.5' }, async () => undefined, context)).rejects.toThrow(ConfigError);
  });
});
