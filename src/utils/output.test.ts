import { describe, it, expect, vi, afterEach } from 'vitest';
import { prefixLines, printDebug, setDebug } from './output';

function stripAnsi(text: string): string {
  return text.replace(/\u001b\[[0-9;]*m/g, '');
}

describe('prefixLines', () => {
  it('prefixes every line and drops the trailing newline', () => {
    expect(stripAnsi(prefixLines('10.0.1.5', 'one\ntwo\n'))).toBe('[10.0.1.5] one\n[10.0.1.5] two');
  });

  it('keeps blank lines inside the text', () => {
    expect(stripAnsi(prefixLines('10.0.1.5', 'one\n\ntwo'))).toBe('[10.0.1.5] one\n[10.0.1.5] \n[10.0.1.5] two');
  });
});

describe('printDebug', () => {
  afterEach(() => {
    setDebug(false);
    vi.restoreAllMocks();
  });

  it('prints nothing unless debug is on', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    setDebug(false);

    printDebug('Remote command');

    expect(log).not.toHaveBeenCalled();
  });

  it('appends the context as JSON when debug is on', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    setDebug(true);

    printDebug('Remote command', { host: '10.0.1.5' });

    expect(stripAnsi(String(log.mock.calls[0][0]))).toBe('[debug] Remote command {"host":"10.0.1.5"}');
  });
});
