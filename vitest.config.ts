import { URL, fileURLToPath } from 'url';
import { defineConfig } from 'vitest/config';

const coreDir = fileURLToPath(new URL('./packages/core/src', import.meta.url));

export default defineConfig({
  resolve: {
    alias: [
      {
        find: '@store-router/core',
        replacement: `${coreDir}/index.ts`,
      },
    ],
  },
  test: {
    globals: true,
    environment: 'node',
    setupFiles: ['packages/core/src/__tests__/setup.ts'],
    include: ['packages/*/src/__tests__/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    pool: 'forks',
    minWorkers: 1,
    maxWorkers: 4,
    testTimeout: 30000,
  },
});
