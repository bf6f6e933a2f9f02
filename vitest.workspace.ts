import { defineWorkspace } from 'vitest/config';

export default defineWorkspace([
  'shared/ts/vitest.config.ts',
  'services/copilot-metrics-exporter/ts/vitest.config.ts',
  'tests/ts/contract/vitest.config.ts',
  'tests/ts/integration/vitest.config.ts',
]);
