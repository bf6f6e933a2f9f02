import { describe, it, expect, beforeEach } from 'vitest';
import {
  createLogger,
  exporterRegistry,
  fetchFailureCount,
  incrementFetchFailure,
  resetExporterMetrics,
} from './index';

function captureLines() {
  const lines: string[] = [];
  return {
    lines,
    destination: {
      write(line: string) {
        lines.push(line);
      },
    },
  };
}

describe('createLogger', () => {
  it('writes structured lines with the service name', () => {
    const sink = captureLines();
    const logger = createLogger({ name: 'copilot-metrics-exporter', level: 'info', destination: sink.destination });

    logger.error({ code: 'TRANSPORT' }, 'Error fetching metrics');
    logger.debug('not written at info level');

    expect(sink.lines).toHaveLength(1);
    const entry = JSON.parse(sink.lines[0]);
    expect(entry).toMatchObject({
      level: 50,
      name: 'copilot-metrics-exporter',
      code: 'TRANSPORT',
      msg: 'Error fetching metrics',
    });
  });
});

describe('fetch failure counter', () => {
  beforeEach(() => {
    resetExporterMetrics();
  });

  it('counts failures by reason', async () => {
    incrementFetchFailure('decode');
    incrementFetchFailure('decode');
    incrementFetchFailure('transport');

    await expect(fetchFailureCount('decode')).resolves.toBe(2);
    await expect(fetchFailureCount('transport')).resolves.toBe(1);
    await expect(fetchFailureCount('upstream_status')).resolves.toBe(0);
  });

  it('is exposed on the exporter registry', async () => {
    incrementFetchFailure('upstream_status');
    const text = await exporterRegistry.getSingleMetricAsString('copilot_exporter_fetch_failures_total');
    expect(text).toContain('copilot_exporter_fetch_failures_total{reason="upstream_status"} 1');
  });
});
