export const NOT_AVAILABLE = 'N/A';
export const NOT_CHECKED = 'Not checked';
export const GATEWAY_NOT_FOUND = 'Gateway not found';

export type FailureKind = 'timeout' | 'not_found' | 'resolution_error' | 'unknown';

export type ProbeOutcome<T = string> =
  | { ok: true; value: T }
  | { ok: false; kind: FailureKind; message: string };

export function success<T>(value: T): ProbeOutcome<T> {
  return { ok: true, value };
}

export function failure<T = never>(kind: FailureKind, message: string): ProbeOutcome<T> {
  return { ok: false, kind, message };
}

/** Read-only inputs for one orchestration run. */
export interface ProbeSettings {
  readonly probeCount: number;
  readonly timeoutSeconds: number;
  readonly dnsServers: readonly string[];
}

export interface DiagnosticReport {
  readonly ipAddress: string;
  readonly interfaceName: string;
  /** Windows only; "N/A" elsewhere. */
  readonly logonServer: string;
  /** Absent when no default route could be read. */
  readonly gateway?: string;
  /** Raw ping output, a failure description, or a sentinel. */
  readonly gatewayPingResult: string;
  /** One entry per configured server, in configured order. */
  readonly dnsResults: readonly DnsResult[];
}

export interface DnsResult {
  readonly hostname: string;
  /** The resolved address or a failure description. */
  readonly result: string;
}

export interface LocalAddress {
  ipAddress: string;
  interfaceName: string;
}
