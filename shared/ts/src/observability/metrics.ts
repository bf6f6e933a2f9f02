import { Counter, register } from 'prom-client';

export type FetchFailureReason = 'transport' | 'upstream_status' | 'decode' | 'internal';

export const fetchFailures = new Counter({
  name: 'copilot_exporter_fetch_failures_total',
  help: 'Number of failed Copilot metrics fetch cycles by reason.',
  labelNames: ['reason'] as const,
});

export function incrementFetchFailure(reason: FetchFailureReason) {
  fetchFailures.labels(reason).inc();
}

export function resetExporterMetrics(): void {
  fetchFailures.reset();
}

export async function fetchFailureCount(reason: FetchFailureReason): Promise<number> {
  const metric = await fetchFailures.get();
  const target = metric.values.find((value) => value.labels.reason === reason);
  return target?.value ?? 0;
}

export { register as exporterRegistry };
