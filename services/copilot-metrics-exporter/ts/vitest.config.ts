import { defineConfig } from 'vitest/config';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    name: 'copilot-metrics-exporter',
    include: ['src/**/*.test.ts'],
    environment: 'node',
    reporters: ['default'],
  },
  resolve: {
    alias: [
      {
        find: '@copilot-exporter/shared',
        replacement: path.resolve(rootDir, '../../../shared/ts/src/index.ts'),
      },
    ],
  },
});
