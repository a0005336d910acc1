import { isIP } from 'node:net';
import { logger } from '../logger.js';
import type { PlatformStrategy } from './platform.js';
import type { CommandRunner } from './runner.js';

const ROUTE_MARKER = 'default via';

function tokens(line: string): string[] {
  return line.trim().split(/\s+/).filter(Boolean);
}

function isAddress(token: string): boolean {
  // Windows prints link-local gateways with a zone suffix, e.g. fe80::1%12.
  return isIP(token.split('%')[0] ?? '') !== 0;
}

/** `ip route` output: the third field of the first `default via` line. */
export function parseRouteTable(output: string): string | undefined {
  for (const line of output.split(/\r?\n/)) {
    if (!line.startsWith(ROUTE_MARKER)) continue;
    const parts = tokens(line);
    if (parts.length >= 3) return parts[2];
  }
  return undefined;
}

/**
 * Label-style dumps (`ipconfig`, `route get`): the last field of the first
 * line containing `label` that ends in an address. Rows with an empty value
 * are skipped.
 */
export function parseLabelledGateway(output: string, label: string): string | undefined {
  const minTokens = tokens(label).length + 1;
  for (const line of output.split(/\r?\n/)) {
    if (!line.includes(label)) continue;
    const parts = tokens(line);
    if (parts.length < minTokens) continue;
    const last = parts[parts.length - 1];
    if (last !== undefined && isAddress(last)) return last;
  }
  return undefined;
}

export async function discoverGateway(
  runner: CommandRunner,
  platform: PlatformStrategy,
  timeoutSeconds: number,
  signal?: AbortSignal,
): Promise<string | undefined> {
  const { command, args } = platform.gatewayCommand;
  const outcome = await runner.run(command, args, { timeoutSeconds, signal });

  if (!outcome.ok) {
    logger.error('Error getting default gateway', { kind: outcome.kind, error: outcome.message });
    return undefined;
  }

  const gateway = platform.parseGateway(outcome.value.stdout);

  if (gateway === undefined) {
    logger.warn('Default gateway not found', { command, exitCode: outcome.value.exitCode });
    return undefined;
  }

  logger.info(`Found default gateway: ${gateway}`);
  return gateway;
}
