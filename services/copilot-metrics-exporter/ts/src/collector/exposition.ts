import { Gauge, Registry } from 'prom-client';

import type { MetricDescriptor } from './descriptors';
import type { Observation } from './exporter';

export interface Exposition {
  contentType: string;
  body: string;
  /** Observations overwritten by a later one with the same metric and labels. */
  collapsed: number;
}

function sampleKey(observation: Observation): string {
  const labels = Object.keys(observation.labels)
    .sort()
    .map((name) => `${name}=${observation.labels[name]}`);
  return `${observation.descriptor.name}{${labels.join(',')}}`;
}

/**
 * Encodes one scrape in the Prometheus text format. Every call builds its own
 * registry, so concurrent scrapes never share gauge state. `extra` registries
 * (process and exporter self metrics) are appended to the output.
 *
 * Two observations with identical labels under one descriptor collapse into
 * one sample; the later one wins, and `collapsed` counts the overwritten ones.
 */
export async function renderExposition(
  descriptors: readonly MetricDescriptor[],
  observations: readonly Observation[],
  extra: readonly Registry[] = [],
): Promise<Exposition> {
  const registry = new Registry();
  const gauges = new Map<string, Gauge>();
  for (const descriptor of descriptors) {
    gauges.set(
      descriptor.name,
      new Gauge({
        name: descriptor.name,
        help: descriptor.help,
        labelNames: descriptor.labelNames,
        registers: [registry],
      }),
    );
  }

  const seen = new Set<string>();
  let collapsed = 0;
  for (const observation of observations) {
    const key = sampleKey(observation);
    if (seen.has(key)) {
      collapsed += 1;
    }
    seen.add(key);

    const gauge = gauges.get(observation.descriptor.name);
    if (!gauge) {
      throw new Error(`observation for undescribed metric ${observation.descriptor.name}`);
    }
    gauge.set(observation.labels, observation.value);
  }

  const output = extra.length > 0 ? Registry.merge([registry, ...extra]) : registry;
  return { contentType: output.contentType, body: await output.metrics(), collapsed };
}
