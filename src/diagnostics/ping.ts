import { logger } from '../logger.js';
import type { PlatformStrategy } from './platform.js';
import type { CommandRunner } from './runner.js';

const FAILURE_PREFIXES = ['Ping failed (', 'Ping timeout after ', 'Ping command not found', 'Ping error: '];

export function pingArgs(platform: PlatformStrategy, host: string, probeCount: number): string[] {
  return [platform.pingCountFlag, String(probeCount), host];
}

/**
 * Pings `host` and returns something displayable: the raw output on success,
 * otherwise a one-line description of what went wrong.
 */
export async function ping(
  runner: CommandRunner,
  platform: PlatformStrategy,
  host: string,
  probeCount: number,
  timeoutSeconds: number,
  signal?: AbortSignal,
): Promise<string> {
  const args = pingArgs(platform, host, probeCount);
  logger.debug(`Executing ping command: ping ${args.join(' ')}`);

  const outcome = await runner.run('ping', args, { timeoutSeconds, signal });

  if (outcome.ok) {
    const { exitCode, stdout } = outcome.value;
    if (exitCode === 0) {
      logger.info(`Ping to ${host} successful`);
      return stdout;
    }
    logger.warn(`Ping to ${host} failed with return code ${exitCode}`);
    return `Ping failed (return code: ${exitCode})`;
  }

  switch (outcome.kind) {
    case 'timeout': {
      const message = `Ping timeout after ${timeoutSeconds} seconds`;
      logger.error(`Ping to ${host}: ${message}`);
      return message;
    }
    case 'not_found':
      logger.error('Ping command not found');
      return 'Ping command not found';
    default: {
      const message = `Ping error: ${outcome.message}`;
      logger.error(`Ping to ${host}: ${message}`);
      return message;
    }
  }
}

export function isPingFailure(result: string): boolean {
  return FAILURE_PREFIXES.some(prefix => result.startsWith(prefix));
}
