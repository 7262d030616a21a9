import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    testTimeout: 10000,
    env: {
      LOG_LEVEL: 'silent',
      LOG_PRETTY: 'false',
    },
  },
});
