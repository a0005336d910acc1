import type { DiagnosticReport } from '../diagnostics/types.js';
import type { ComponentStatus, HealthStatus } from '../health.js';

const STATUS_ICON: Record<ComponentStatus, string> = {
  healthy: 'OK  ',
  degraded: 'WARN',
  unhealthy: 'FAIL',
};

function indent(text: string, prefix: string): string[] {
  return text
    .split(/\r?\n/)
    .map(line => line.trimEnd())
    .filter(line => line.length > 0)
    .map(line => `${prefix}${line}`);
}

export function formatReport(report: DiagnosticReport, summary: HealthStatus): string {
  const { components } = summary;
  const lines = [
    `Network diagnostics: ${summary.status}`,
    '',
    `[${STATUS_ICON[components.address.status]}] IP address:      ${report.ipAddress}`,
    `       Interface:       ${report.interfaceName}`,
    `       Logon server:    ${report.logonServer}`,
    `[${STATUS_ICON[components.gateway.status]}] Default gateway: ${report.gateway ?? 'Not found'}`,
    `[${STATUS_ICON[components.gatewayPing.status]}] Gateway ping:`,
    ...indent(report.gatewayPingResult, '         '),
    `[${STATUS_ICON[components.dns.status]}] DNS:`,
    ...report.dnsResults.map(({ hostname, result }) => `         ${hostname}: ${result}`),
  ];
  return lines.join('\n');
}

export function reportToJSON(report: DiagnosticReport, summary: HealthStatus): string {
  return JSON.stringify({ report, summary }, null, 2);
}
