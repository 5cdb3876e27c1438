import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { makeSettings } from '../testing/fakes';
import { RemoteCommandError } from '../utils/errors';
import { setDebug } from '../utils/output';
import { sshExecStream } from '../utils/ssh';
import { buildRemoteCommand, createRemoteExecutor, shellQuote } from './remote-executor';

vi.mock('../utils/ssh', () => ({
  sshExecStream: vi.fn(),
}));

const execMock = vi.mocked(sshExecStream);

function stripAnsi(text: string): string {
  return text.replace(/\u001b\[[0-9;]*m/g, '');
}

describe('shellQuote', () => {
  it('wraps in single quotes and escapes embedded ones', () => {
    expect(shellQuote('echo hi')).toBe("'echo hi'");
    expect(shellQuote("it's")).toBe("'it'\\''s'");
  });
});

describe('buildRemoteCommand', () => {
  it('runs plain commands as-is', () => {
    expect(buildRemoteCommand('git fetch')).toBe('git fetch');
  });

  it('changes directory first', () => {
    expect(buildRemoteCommand('git fetch', { cwd: '~/shop' })).toBe('cd ~/shop && git fetch');
  });

  it('wraps the whole line in the profile shell', () => {
    expect(buildRemoteCommand("find -type f -regex '.+\\.pyc' -delete", { cwd: '~/shop', shell: 'bash -i -c' }))
      .toBe("bash -i -c 'cd ~/shop && find -type f -regex '\\''.+\\.pyc'\\'' -delete'");
  });
});

describe('SSHExecutor', () => {
  const settings = makeSettings({ ssh: { user: 'ops', port: 2222, connect_timeout: 15 } });

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    execMock.mockReset();
  });

  it('connects with the configured user, port and timeout', async () => {
    execMock.mockResolvedValueOnce({ stdout: 'ok\n', stderr: '', exitCode: 0 });
    const executor = createRemoteExecutor('10.0.1.5', settings);

    const result = await executor.run('service shop reload', { cwd: '/srv' });

    expect(result.stdout).toBe('ok\n');
    expect(execMock).toHaveBeenCalledTimes(1);
    const [connection, command, options] = execMock.mock.calls[0];
    expect(connection).toEqual({ host: '10.0.1.5', port: 2222, user: 'ops', privateKey: undefined });
    expect(command).toBe('cd /srv && service shop reload');
    expect(options?.timeout).toBe(15);
  });

  it('wraps profile commands in an interactive shell', async () => {
    execMock.mockResolvedValueOnce({ stdout: '', stderr: '', exitCode: 0 });
    const executor = createRemoteExecutor('10.0.1.5', settings);

    await executor.runWithShellProfile('./scripts/migrate-db upgrade', { cwd: '~/shop' });

    expect(execMock.mock.calls[0][1]).toBe("bash -i -c 'cd ~/shop && ./scripts/migrate-db upgrade'");
  });

  it('throws RemoteCommandError on a non-zero exit', async () => {
    execMock.mockResolvedValueOnce({ stdout: '', stderr: 'shop: unrecognized service\n', exitCode: 1 });
    const executor = createRemoteExecutor('10.0.1.5', settings);

    const run = executor.run('service shop status');

    await expect(run).rejects.toBeInstanceOf(RemoteCommandError);
    await expect(run).rejects.toMatchObject({
      host: '10.0.1.5',
      command: 'service shop status',
      exitCode: 1,
      suggestion: 'shop: unrecognized service',
    });
  });

  it('only warns on a non-zero exit when warnOnly is set', async () => {
    execMock.mockResolvedValueOnce({ stdout: '', stderr: '', exitCode: 7 });
    const executor = createRemoteExecutor('10.0.1.5', settings);

    await expect(executor.run('curl -sS http://127.0.0.1:5000/health', { warnOnly: true }))
      .resolves.toMatchObject({ exitCode: 7 });
  });

  it('streams output with the host prefix', async () => {
    execMock.mockImplementationOnce(async (_conn, _command, options) => {
      options?.onStdout?.('line one\n');
      return { stdout: 'line one\n', stderr: '', exitCode: 0 };
    });
    const log = vi.mocked(console.log);
    const executor = createRemoteExecutor('10.0.1.5', settings);

    await executor.run('uptime');

    const printed = log.mock.calls.map((call) => String(call[0]));
    expect(printed.some((line) => line.endsWith('line one') && line.includes('[10.0.1.5]'))).toBe(true);
  });

  it('joins lines split across chunks before prefixing them', async () => {
    execMock.mockImplementationOnce(async (_conn, _command, options) => {
      options?.onStdout?.('line o');
      options?.onStderr?.('warn');
      options?.onStdout?.('ne\nsecond');
      options?.onStderr?.('ing\n');
      return { stdout: 'line one\nsecond', stderr: 'warning\n', exitCode: 0 };
    });
    setDebug(false);
    const log = vi.mocked(console.log);
    const executor = createRemoteExecutor('10.0.1.5', settings);

    await executor.run('uptime');

    const printed = log.mock.calls.map((call) => stripAnsi(String(call[0])));
    expect(printed).toEqual([
      '[10.0.1.5] $ uptime',
      '[10.0.1.5] line one',
      '[10.0.1.5] warning',
      '[10.0.1.5] second',
    ]);
  });
});
