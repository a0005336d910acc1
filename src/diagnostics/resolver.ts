import * as os from 'node:os';
import * as dns from 'node:dns/promises';
import { logger } from '../logger.js';
import { AbortedError, TimeoutError, errorMessage } from '../errors.js';
import { secondsToMs, withTimeout } from '../utils.js';
import type { PlatformStrategy } from './platform.js';
import { NOT_AVAILABLE, failure, success, type LocalAddress, type ProbeOutcome } from './types.js';

export type InterfaceEnumerator = () => NodeJS.Dict<os.NetworkInterfaceInfo[]>;
export type HostLookup = (hostname: string) => Promise<string>;

export interface ResolverDeps {
  platform: PlatformStrategy;
  networkInterfaces?: InterfaceEnumerator;
  lookup?: HostLookup;
  env?: Record<string, string | undefined>;
}

// Negative answers from getaddrinfo and the c-ares resolver.
const RESOLUTION_ERROR_CODES = new Set([
  'ENOTFOUND',
  'ENODATA',
  'ENONAME',
  'EAI_AGAIN',
  'EAI_FAIL',
  'EAI_NONAME',
  'ESERVFAIL',
  'EREFUSED',
  'EBADNAME',
  'EFORMERR',
]);

const defaultLookup: HostLookup = async hostname => {
  // IPv4 only; IP literals come back unchanged.
  const { address } = await dns.lookup(hostname, { family: 4 });
  return address;
};

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') return err.code;
  return undefined;
}

export function isLoopback(address: string): boolean {
  return address.startsWith('127.');
}

export class NetworkFactResolver {
  private readonly platform: PlatformStrategy;
  private readonly networkInterfaces: InterfaceEnumerator;
  private readonly lookup: HostLookup;
  private readonly env: Record<string, string | undefined>;

  constructor(deps: ResolverDeps) {
    this.platform = deps.platform;
    this.networkInterfaces = deps.networkInterfaces ?? os.networkInterfaces;
    this.lookup = deps.lookup ?? defaultLookup;
    this.env = deps.env ?? process.env;
  }

  /**
   * First IPv4 address outside 127.0.0.0/8. Interfaces are visited in the
   * order the OS reports them, which is not guaranteed to be stable.
   */
  resolveLocalIpAndInterface(): LocalAddress {
    try {
      for (const [name, addresses] of Object.entries(this.networkInterfaces())) {
        for (const addr of addresses ?? []) {
          if (addr.family === 'IPv4' && !isLoopback(addr.address)) {
            logger.info(`Found IP ${addr.address} on interface ${name}`);
            return { ipAddress: addr.address, interfaceName: name };
          }
        }
      }
      logger.warn('No non-loopback IP address found');
    } catch (err) {
      logger.error('Error getting IP and interface', { error: errorMessage(err) });
    }
    return { ipAddress: NOT_AVAILABLE, interfaceName: NOT_AVAILABLE };
  }

  resolveLogonServer(): string {
    if (!this.platform.hasLogonServer) return NOT_AVAILABLE;
    const logonServer = this.env.LOGONSERVER || NOT_AVAILABLE;
    logger.info(`Logon server: ${logonServer}`);
    return logonServer;
  }

  /** Forward lookup with a deadline that belongs to this call alone. */
  async resolveDns(
    hostname: string,
    timeoutSeconds: number,
    signal?: AbortSignal,
  ): Promise<ProbeOutcome<string>> {
    logger.debug(`Resolving DNS for ${hostname}`);
    try {
      const address = await withTimeout(
        this.lookup(hostname),
        secondsToMs(timeoutSeconds),
        `dns.lookup ${hostname}`,
        'dns',
        signal,
      );
      logger.info(`DNS resolution for ${hostname}: ${address}`);
      return success(address);
    } catch (err) {
      const code = errorCode(err);
      if (err instanceof TimeoutError || code === 'ETIMEOUT') {
        logger.error(`DNS query for ${hostname}: timeout after ${timeoutSeconds} seconds`);
        return failure('timeout', errorMessage(err));
      }
      if (code !== undefined && RESOLUTION_ERROR_CODES.has(code)) {
        logger.error(`DNS query for ${hostname}: resolution failed`, { code, error: errorMessage(err) });
        return failure('resolution_error', errorMessage(err));
      }
      if (err instanceof AbortedError) {
        logger.warn(`DNS query for ${hostname} aborted`);
      } else {
        logger.error(`DNS query for ${hostname}: unexpected error`, { error: errorMessage(err) });
      }
      return failure('unknown', errorMessage(err));
    }
  }
}

export function describeDnsOutcome(outcome: ProbeOutcome<string>, timeoutSeconds: number): string {
  if (outcome.ok) return outcome.value;
  switch (outcome.kind) {
    case 'timeout':
      return `DNS timeout after ${timeoutSeconds} seconds`;
    case 'resolution_error':
      return `DNS resolution failed: ${outcome.message}`;
    default:
      return `DNS error: ${outcome.message}`;
  }
}
