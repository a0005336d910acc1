import { isIP } from 'node:net';
import { isPingFailure } from './diagnostics/ping.js';
import { GATEWAY_NOT_FOUND, NOT_AVAILABLE, NOT_CHECKED, type DiagnosticReport } from './diagnostics/types.js';

export type ComponentStatus = 'healthy' | 'degraded' | 'unhealthy';

export interface ComponentHealth {
  status: ComponentStatus;
  message: string;
}

export interface HealthStatus {
  status: ComponentStatus;
  components: {
    address: ComponentHealth;
    gateway: ComponentHealth;
    gatewayPing: ComponentHealth;
    dns: ComponentHealth;
  };
}

function worst(a: ComponentStatus, b: ComponentStatus): ComponentStatus {
  const rank: Record<ComponentStatus, number> = { healthy: 0, degraded: 1, unhealthy: 2 };
  return rank[a] >= rank[b] ? a : b;
}

function checkAddress(report: DiagnosticReport): ComponentHealth {
  if (report.ipAddress === NOT_AVAILABLE) {
    return { status: 'unhealthy', message: 'No non-loopback IPv4 address' };
  }
  return { status: 'healthy', message: `${report.ipAddress} on ${report.interfaceName}` };
}

function checkGateway(report: DiagnosticReport): ComponentHealth {
  if (report.gateway === undefined) {
    return { status: 'unhealthy', message: 'Default gateway not found' };
  }
  return { status: 'healthy', message: report.gateway };
}

function checkGatewayPing(report: DiagnosticReport): ComponentHealth {
  const result = report.gatewayPingResult;
  if (result === GATEWAY_NOT_FOUND || result === NOT_CHECKED) {
    return { status: 'unhealthy', message: result };
  }
  if (isPingFailure(result)) {
    return { status: 'unhealthy', message: result };
  }
  return { status: 'healthy', message: 'Gateway reachable' };
}

function checkDns(report: DiagnosticReport): ComponentHealth {
  const entries = report.dnsResults;
  const failed = entries.filter(({ result }) => isIP(result) === 0).map(({ hostname }) => hostname);

  if (failed.length === 0) {
    return { status: 'healthy', message: `${entries.length} name(s) resolved` };
  }
  const status: ComponentStatus = failed.length === entries.length ? 'unhealthy' : 'degraded';
  return { status, message: `Unresolved: ${failed.join(', ')}` };
}

/** Grades a finished report per check and overall. */
export function summarizeReport(report: DiagnosticReport): HealthStatus {
  const address = checkAddress(report);
  const gateway = checkGateway(report);
  const gatewayPing = checkGatewayPing(report);
  const dns = checkDns(report);

  let overall: ComponentStatus = 'healthy';
  overall = worst(overall, address.status);
  overall = worst(overall, gateway.status);
  overall = worst(overall, gatewayPing.status);
  overall = worst(overall, dns.status);

  return {
    status: overall,
    components: { address, gateway, gatewayPing, dns },
  };
}
