import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('../logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

import { ping, pingArgs, isPingFailure } from './ping.js';
import { linuxPlatform, windowsPlatform } from './platform.js';
import type { CommandOutput, CommandRunner } from './runner.js';
import type { ProbeOutcome } from './types.js';

const PING_OUTPUT = [
  'PING 10.0.0.1 (10.0.0.1) 56(84) bytes of data.',
  '64 bytes from 10.0.0.1: icmp_seq=1 ttl=64 time=0.412 ms',
  '',
].join('\n');

function fakeRunner(outcome: ProbeOutcome<CommandOutput>) {
  const run = vi.fn<CommandRunner['run']>().mockResolvedValue(outcome);
  const runner: CommandRunner = { run };
  return { runner, run };
}

describe('pingArgs', () => {
  it('uses -c on Linux and -n on Windows', () => {
    expect(pingArgs(linuxPlatform, '10.0.0.1', 1)).toEqual(['-c', '1', '10.0.0.1']);
    expect(pingArgs(windowsPlatform, '10.0.0.1', 4)).toEqual(['-n', '4', '10.0.0.1']);
  });

  it('keeps the host as a single separate argument', () => {
    const host = '10.0.0.1 -f; rm -rf /';
    expect(pingArgs(linuxPlatform, host, 2)).toEqual(['-c', '2', host]);
  });
});

describe('ping', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('returns raw stdout on exit code 0', async () => {
    const { runner, run } = fakeRunner({ ok: true, value: { stdout: PING_OUTPUT, stderr: '', exitCode: 0 } });

    await expect(ping(runner, linuxPlatform, '10.0.0.1', 1, 5)).resolves.toBe(PING_OUTPUT);
    expect(run).toHaveBeenCalledWith('ping', ['-c', '1', '10.0.0.1'], { timeoutSeconds: 5, signal: undefined });
  });

  it('formats a non-zero exit code', async () => {
    const { runner } = fakeRunner({ ok: true, value: { stdout: '', stderr: '', exitCode: 1 } });
    await expect(ping(runner, linuxPlatform, '10.0.0.1', 1, 5)).resolves.toBe('Ping failed (return code: 1)');
  });

  it('mentions the timeout when the process is killed for running too long', async () => {
    const { runner } = fakeRunner({ ok: false, kind: 'timeout', message: 'ping -c 1 10.0.0.1 timed out after 5 seconds' });

    const result = await ping(runner, linuxPlatform, '10.0.0.1', 1, 5);

    expect(result).toBe('Ping timeout after 5 seconds');
    expect(result.toLowerCase()).toContain('timeout');
  });

  it('reports a missing ping binary', async () => {
    const { runner } = fakeRunner({ ok: false, kind: 'not_found', message: 'Command not found: ping' });
    await expect(ping(runner, linuxPlatform, '10.0.0.1', 1, 5)).resolves.toBe('Ping command not found');
  });

  it('reports any other failure with its message', async () => {
    const { runner } = fakeRunner({ ok: false, kind: 'unknown', message: 'Permission denied: ping' });
    await expect(ping(runner, windowsPlatform, '10.0.0.1', 1, 5)).resolves.toBe('Ping error: Permission denied: ping');
  });
});

describe('isPingFailure', () => {
  it('recognises the failure descriptions', () => {
    expect(isPingFailure('Ping failed (return code: 1)')).toBe(true);
    expect(isPingFailure('Ping timeout after 5 seconds')).toBe(true);
    expect(isPingFailure('Ping command not found')).toBe(true);
    expect(isPingFailure('Ping error: boom')).toBe(true);
  });

  it('treats real ping output as success', () => {
    expect(isPingFailure(PING_OUTPUT)).toBe(false);
    expect(isPingFailure('\r\nPinging 192.168.1.1 with 32 bytes of data:')).toBe(false);
  });
});
