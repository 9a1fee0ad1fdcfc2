import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    testTimeout: 10_000,
    env: {
      // Components log through pino; keep test output quiet.
      LOG_LEVEL: 'silent',
    },
  },
});
