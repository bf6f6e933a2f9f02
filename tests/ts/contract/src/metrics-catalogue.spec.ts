import { describe, it, expect } from 'vitest';
import catalogue from '../../../../contracts/metrics-catalogue.json';
import { createDescriptorRegistry } from '../../../../services/copilot-metrics-exporter/ts/src/collector/descriptors';

function published(descriptors: ReturnType<ReturnType<typeof createDescriptorRegistry>['list']>) {
  return descriptors.map(({ name, help, labelNames }) => ({ name, help, labelNames: [...labelNames] }));
}

describe('metrics catalogue contract', () => {
  it('matches the full profile exactly, in order', () => {
    const descriptors = createDescriptorRegistry('full').list();

    expect(descriptors).toHaveLength(catalogue.profiles.full);
    expect(published(descriptors)).toEqual(catalogue.metrics);
  });

  it('publishes the minimal profile as the leading entries', () => {
    const descriptors = createDescriptorRegistry('minimal').list();

    expect(descriptors).toHaveLength(catalogue.profiles.minimal);
    expect(published(descriptors)).toEqual(catalogue.metrics.slice(0, catalogue.profiles.minimal));
  });

  it('keeps metric names unique and prefixed', () => {
    const names = catalogue.metrics.map((metric) => metric.name);

    expect(new Set(names).size).toBe(names.length);
    for (const name of names) {
      expect(name).toMatch(/^github_copilot_[a-z_]+$/);
    }
  });

  it('labels every metric by day and org first', () => {
    for (const metric of catalogue.metrics) {
      expect(metric.labelNames.slice(0, 2)).toEqual(['day', 'org']);
    }
  });
});
