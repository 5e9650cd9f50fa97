import { describe, expect, it } from 'vitest';

import { commandLines, firstLine, splitOutputLines } from './runner.js';
import { createScriptedRunner } from './scripted.js';

describe('splitOutputLines', () => {
  it('trims lines and drops the terminating newline', () => {
    expect(splitOutputLines('  Network 1 exists  \r\nSubnet IPv6: \n')).toEqual([
      'Network 1 exists',
      'Subnet IPv6:',
    ]);
  });

  it('returns no lines for empty output', () => {
    expect(splitOutputLines('')).toEqual([]);
  });
});

describe('commandLines', () => {
  it('treats failed and timed-out runs as no data', () => {
    expect(commandLines({ status: 'failed', exitCode: 1, lines: ['PRCR-1001'] })).toEqual([]);
    expect(commandLines({ status: 'timeout', timeoutMs: 1000 })).toEqual([]);
    expect(firstLine({ status: 'timeout', timeoutMs: 1000 })).toBe('');
  });

  it('returns the lines of a successful run', () => {
    expect(firstLine({ status: 'ok', lines: ['rac-cluster', 'extra'] })).toBe('rac-cluster');
  });
});

describe('createScriptedRunner', () => {
  it('replays scripted output and records calls', async () => {
    const runner = createScriptedRunner({
      '/grid/bin/cemutlo -n': 'rac-cluster\n',
      '/grid/bin/olsnodes': { status: 'failed', exitCode: 1, lines: [] },
    });

    expect(await runner.run(['/grid/bin/cemutlo', '-n'])).toEqual({
      status: 'ok',
      lines: ['rac-cluster'],
    });
    expect(await runner.run(['/grid/bin/olsnodes'])).toEqual({
      status: 'failed',
      exitCode: 1,
      lines: [],
    });
    expect(runner.calls).toEqual(['/grid/bin/cemutlo -n', '/grid/bin/olsnodes']);
  });

  it('fails commands missing from the script', async () => {
    const runner = createScriptedRunner({});
    expect(await runner.run(['/grid/bin/srvctl', 'config', 'database'])).toEqual({
      status: 'failed',
      exitCode: 127,
      lines: [],
    });
  });
});
