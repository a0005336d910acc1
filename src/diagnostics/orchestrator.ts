import { logger } from '../logger.js';
import { errorMessage } from '../errors.js';
import { recordDiagnosticsRun, recordProbe, type ProbeName } from '../metrics.js';
import { discoverGateway } from './gateway.js';
import { isPingFailure, ping } from './ping.js';
import type { PlatformStrategy } from './platform.js';
import { describeDnsOutcome, type NetworkFactResolver } from './resolver.js';
import type { CommandRunner } from './runner.js';
import {
  GATEWAY_NOT_FOUND,
  NOT_AVAILABLE,
  NOT_CHECKED,
  type DiagnosticReport,
  type DnsResult,
  type LocalAddress,
  type ProbeSettings,
} from './types.js';

interface StepResult<T> {
  value: T;
  healthy: boolean;
}

export interface OrchestratorDeps {
  runner: CommandRunner;
  platform: PlatformStrategy;
  resolver: NetworkFactResolver;
  settings: ProbeSettings;
}

export class DiagnosticOrchestrator {
  constructor(private readonly deps: OrchestratorDeps) {}

  /**
   * Runs every check in a fixed order. Each check is isolated: a failure is
   * logged and leaves its field at a sentinel. Never rejects.
   *
   * Once `signal` aborts, the remaining checks are skipped and keep "Not checked".
   */
  async runAllChecks(signal?: AbortSignal): Promise<DiagnosticReport> {
    const { runner, platform, resolver, settings } = this.deps;
    const { probeCount, timeoutSeconds, dnsServers } = settings;

    logger.info('Starting network diagnostics', {
      platform: platform.family,
      probeCount,
      timeoutSeconds,
      dnsServers: [...dnsServers],
    });
    const start = Date.now();
    let failedChecks = 0;

    const step = async <T>(
      probe: ProbeName,
      fallback: T,
      fn: () => StepResult<T> | Promise<StepResult<T>>,
    ): Promise<T> => {
      if (signal?.aborted) {
        logger.warn(`Skipping ${probe} check: run aborted`);
        return fallback;
      }
      const stepStart = Date.now();
      let result: StepResult<T> = { value: fallback, healthy: false };
      try {
        result = await fn();
      } catch (err) {
        logger.error(`Unexpected error in ${probe} check`, { error: errorMessage(err) });
      }
      if (!result.healthy) failedChecks++;
      await recordProbe(probe, Date.now() - stepStart, !result.healthy).catch(err =>
        logger.debug('Metrics flush failed', { error: errorMessage(err) }),
      );
      return result.value;
    };

    const local = await step<LocalAddress>(
      'interfaces',
      { ipAddress: NOT_AVAILABLE, interfaceName: NOT_AVAILABLE },
      () => {
        const value = resolver.resolveLocalIpAndInterface();
        return { value, healthy: value.ipAddress !== NOT_AVAILABLE };
      },
    );

    const logonServer = await step<string>('logonServer', NOT_AVAILABLE, () => ({
      value: resolver.resolveLogonServer(),
      healthy: true,
    }));

    const gateway = await step<string | undefined>('gateway', undefined, async () => {
      const value = await discoverGateway(runner, platform, timeoutSeconds, signal);
      return { value, healthy: value !== undefined };
    });

    let gatewayPingResult: string = NOT_CHECKED;
    if (gateway !== undefined) {
      gatewayPingResult = await step<string>('ping', NOT_CHECKED, async () => {
        const value = await ping(runner, platform, gateway, probeCount, timeoutSeconds, signal);
        return { value, healthy: !isPingFailure(value) };
      });
    } else if (!signal?.aborted) {
      gatewayPingResult = GATEWAY_NOT_FOUND;
    }

    const dnsResults: DnsResult[] = [];
    for (const server of dnsServers) {
      const result = await step<string>('dns', NOT_CHECKED, async () => {
        const outcome = await resolver.resolveDns(server, timeoutSeconds, signal);
        return { value: describeDnsOutcome(outcome, timeoutSeconds), healthy: outcome.ok };
      });
      dnsResults.push(Object.freeze({ hostname: server, result }));
    }

    const durationMs = Date.now() - start;
    logger.info('Network diagnostics completed', { durationMs, failedChecks });
    await recordDiagnosticsRun(durationMs, failedChecks).catch(err =>
      logger.debug('Metrics flush failed', { error: errorMessage(err) }),
    );

    return Object.freeze({
      ipAddress: local.ipAddress,
      interfaceName: local.interfaceName,
      logonServer,
      ...(gateway !== undefined ? { gateway } : {}),
      gatewayPingResult,
      dnsResults: Object.freeze(dnsResults),
    });
  }
}
