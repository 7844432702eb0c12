import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['sdk/node/src/**/*.test.ts'],
    env: {
      LOG_LEVEL: 'silent',
    },
    testTimeout: 5000,
  },
});
