import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['client/src/**/*.test.ts'],
    environment: 'node',
    env: {
      LOG_TO_FILE: 'false',
    },
    testTimeout: 10000,
  },
});
