import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'ismr-downloader',
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    setupFiles: ['src/__tests__/setup.ts'],
    testTimeout: 10000,
    pool: 'forks',
    globals: true,
    environment: 'node',
    env: {
      LOG_LEVEL: 'error',
    },
  },
});
