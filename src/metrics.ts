import { createMetricsLogger, Unit } from 'aws-embedded-metrics';
import { getRunId, getCommand } from './context.js';

export type ProbeName = 'interfaces' | 'logonServer' | 'gateway' | 'ping' | 'dns';

let enabled = false;
let namespace = 'NetCheck';

export function configureMetrics(options: { enabled: boolean; namespace?: string }): void {
  enabled = options.enabled;
  if (options.namespace) namespace = options.namespace;
}

async function withMetrics(
  dimensions: Record<string, string>,
  fn: (m: ReturnType<typeof createMetricsLogger>) => void,
): Promise<void> {
  if (!enabled) return;

  const metrics = createMetricsLogger();
  metrics.setNamespace(namespace);

  const runId = getRunId();
  if (runId) metrics.setProperty('runId', runId);

  // setDimensions replaces the whole set, so the command goes in the same call.
  const command = getCommand();
  const dimensionSet = command ? { command, ...dimensions } : dimensions;
  if (Object.keys(dimensionSet).length > 0) metrics.setDimensions(dimensionSet);

  fn(metrics);

  await metrics.flush();
}

export async function recordProbe(
  probe: ProbeName,
  durationMs: number,
  failed: boolean,
): Promise<void> {
  await withMetrics({ probe }, m => {
    m.putMetric('probe.duration', durationMs, Unit.Milliseconds);
    if (failed) {
      m.putMetric('probe.failures', 1, Unit.Count);
    }
  });
}

export async function recordDiagnosticsRun(
  durationMs: number,
  degradedChecks: number,
): Promise<void> {
  await withMetrics({}, m => {
    m.putMetric('diagnostics.run.duration', durationMs, Unit.Milliseconds);
    m.putMetric('diagnostics.run.degraded', degradedChecks, Unit.Count);
  });
}
