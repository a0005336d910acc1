import type { Config } from '../config.js';
import { DiagnosticOrchestrator } from './orchestrator.js';
import { selectPlatform, type PlatformStrategy } from './platform.js';
import { NetworkFactResolver } from './resolver.js';
import { ProcessCommandRunner, type CommandRunner } from './runner.js';
import type { ProbeSettings } from './types.js';

export function buildProbeSettings(config: Config): ProbeSettings {
  return Object.freeze({
    probeCount: config.network.pingCount,
    timeoutSeconds: config.network.timeoutSeconds,
    dnsServers: Object.freeze([...config.network.dnsServers]),
  });
}

export interface CreateOrchestratorOptions {
  platform?: PlatformStrategy;
  runner?: CommandRunner;
  resolver?: NetworkFactResolver;
}

/** Wires the production runner and resolver for the detected OS family. */
export function createOrchestrator(
  config: Config,
  options: CreateOrchestratorOptions = {},
): DiagnosticOrchestrator {
  const platform = options.platform ?? selectPlatform();
  return new DiagnosticOrchestrator({
    platform,
    runner: options.runner ?? new ProcessCommandRunner(),
    resolver: options.resolver ?? new NetworkFactResolver({ platform }),
    settings: buildProbeSettings(config),
  });
}
