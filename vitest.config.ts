import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: false,
    environment: 'node',
    watch: false,
    include: ['packages/*/src/**/*.test.ts', 'apps/*/src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    env: {
      LOG_LEVEL: 'silent',
      NODE_ENV: 'test',
    },
    testTimeout: 20000,
  },
});
