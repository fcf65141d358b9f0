import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['core/src/**/*.test.ts', 'server/src/**/*.test.ts', 'cli/src/**/*.test.ts'],
    exclude: ['node_modules/**', 'dist/**'],
    testTimeout: 20_000,
  },
  resolve: {
    alias: [
      {
        find: '@rangeserve/core',
        replacement: new URL('./core/src/index.ts', import.meta.url).pathname,
      },
      {
        find: '@rangeserve/server',
        replacement: new URL('./server/src/index.ts', import.meta.url).pathname,
      },
    ],
  },
});
