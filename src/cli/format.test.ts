import { describe, it, expect } from 'vitest';
import { formatReport, reportToJSON } from './format.js';
import { summarizeReport } from '../health.js';
import type { DiagnosticReport } from '../diagnostics/types.js';

const REPORT: DiagnosticReport = {
  ipAddress: '10.0.0.5',
  interfaceName: 'eth0',
  logonServer: 'N/A',
  gateway: '10.0.0.1',
  gatewayPingResult: 'PING 10.0.0.1 (10.0.0.1) 56(84) bytes of data.\n64 bytes from 10.0.0.1: icmp_seq=1 ttl=64 time=0.4 ms\n\n',
  dnsResults: [
    { hostname: 'google.com', result: '142.250.1.1' },
    { hostname: 'nothing.invalid', result: 'DNS resolution failed: getaddrinfo ENOTFOUND nothing.invalid' },
  ],
};

describe('formatReport', () => {
  it('renders every field with its check status', () => {
    const text = formatReport(REPORT, summarizeReport(REPORT));

    expect(text.split('\n')).toEqual([
      'Network diagnostics: degraded',
      '',
      '[OK  ] IP address:      10.0.0.5',
      '       Interface:       eth0',
      '       Logon server:    N/A',
      '[OK  ] Default gateway: 10.0.0.1',
      '[OK  ] Gateway ping:',
      '         PING 10.0.0.1 (10.0.0.1) 56(84) bytes of data.',
      '         64 bytes from 10.0.0.1: icmp_seq=1 ttl=64 time=0.4 ms',
      '[WARN] DNS:',
      '         google.com: 142.250.1.1',
      '         nothing.invalid: DNS resolution failed: getaddrinfo ENOTFOUND nothing.invalid',
    ]);
  });

  it('shows a missing gateway', () => {
    const report: DiagnosticReport = { ...REPORT, gateway: undefined, gatewayPingResult: 'Gateway not found' };
    const lines = formatReport(report, summarizeReport(report)).split('\n');

    expect(lines[5]).toBe('[FAIL] Default gateway: Not found');
    expect(lines[7]).toBe('         Gateway not found');
  });
});

describe('reportToJSON', () => {
  it('serializes report and summary, omitting an absent gateway', () => {
    const report: DiagnosticReport = {
      ipAddress: 'N/A',
      interfaceName: 'N/A',
      logonServer: 'N/A',
      gatewayPingResult: 'Gateway not found',
      dnsResults: [{ hostname: '8.8.8.8', result: '8.8.8.8' }],
    };

    const parsed = JSON.parse(reportToJSON(report, summarizeReport(report)));

    expect(parsed.report).toEqual(report);
    expect('gateway' in parsed.report).toBe(false);
    expect(parsed.summary.status).toBe('unhealthy');
  });

  it('keeps DNS results in configured order, numeric names included', () => {
    const report: DiagnosticReport = {
      ...REPORT,
      dnsResults: [
        { hostname: 'google.com', result: '142.250.1.1' },
        { hostname: '10', result: '0.0.0.10' },
      ],
    };

    const parsed = JSON.parse(reportToJSON(report, summarizeReport(report)));

    expect(parsed.report.dnsResults).toEqual([
      { hostname: 'google.com', result: '142.250.1.1' },
      { hostname: '10', result: '0.0.0.10' },
    ]);
    expect(formatReport(report, summarizeReport(report)).split('\n').slice(-2)).toEqual([
      '         google.com: 142.250.1.1',
      '         10: 0.0.0.10',
    ]);
  });
});
