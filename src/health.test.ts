import { describe, it, expect } from 'vitest';
import { summarizeReport } from './health.js';
import type { DiagnosticReport } from './diagnostics/types.js';

function makeReport(overrides?: Partial<DiagnosticReport>): DiagnosticReport {
  return {
    ipAddress: '10.0.0.5',
    interfaceName: 'eth0',
    logonServer: 'N/A',
    gateway: '10.0.0.1',
    gatewayPingResult: '64 bytes from 10.0.0.1: icmp_seq=1 ttl=64 time=0.4 ms\n',
    dnsResults: [
      { hostname: 'google.com', result: '142.250.1.1' },
      { hostname: '8.8.8.8', result: '8.8.8.8' },
    ],
    ...overrides,
  };
}

describe('summarizeReport', () => {
  it('is healthy when every check passed', () => {
    const summary = summarizeReport(makeReport());

    expect(summary.status).toBe('healthy');
    expect(summary.components).toEqual({
      address: { status: 'healthy', message: '10.0.0.5 on eth0' },
      gateway: { status: 'healthy', message: '10.0.0.1' },
      gatewayPing: { status: 'healthy', message: 'Gateway reachable' },
      dns: { status: 'healthy', message: '2 name(s) resolved' },
    });
  });

  it('flags a missing address', () => {
    const summary = summarizeReport(makeReport({ ipAddress: 'N/A', interfaceName: 'N/A' }));
    expect(summary.components.address.status).toBe('unhealthy');
    expect(summary.status).toBe('unhealthy');
  });

  it('flags a missing gateway and the sentinel ping result', () => {
    const summary = summarizeReport(makeReport({ gateway: undefined, gatewayPingResult: 'Gateway not found' }));

    expect(summary.components.gateway).toEqual({ status: 'unhealthy', message: 'Default gateway not found' });
    expect(summary.components.gatewayPing).toEqual({ status: 'unhealthy', message: 'Gateway not found' });
  });

  it('flags a failed ping with its description', () => {
    const summary = summarizeReport(makeReport({ gatewayPingResult: 'Ping failed (return code: 1)' }));
    expect(summary.components.gatewayPing).toEqual({ status: 'unhealthy', message: 'Ping failed (return code: 1)' });
  });

  it('is degraded when only some names resolve', () => {
    const summary = summarizeReport(
      makeReport({
        dnsResults: [
          { hostname: 'google.com', result: 'DNS resolution failed: getaddrinfo ENOTFOUND google.com' },
          { hostname: '8.8.8.8', result: '8.8.8.8' },
        ],
      }),
    );

    expect(summary.components.dns).toEqual({ status: 'degraded', message: 'Unresolved: google.com' });
    expect(summary.status).toBe('degraded');
  });

  it('is unhealthy when no name resolves', () => {
    const summary = summarizeReport(
      makeReport({
        dnsResults: [
          { hostname: 'google.com', result: 'DNS timeout after 5 seconds' },
          { hostname: '8.8.8.8', result: 'Not checked' },
        ],
      }),
    );
    expect(summary.components.dns).toEqual({ status: 'unhealthy', message: 'Unresolved: google.com, 8.8.8.8' });
  });

  it('ignores the logon server', () => {
    expect(summarizeReport(makeReport({ logonServer: 'N/A' })).status).toBe('healthy');
  });
});
