import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    testTimeout: 15_000,
    env: {
      MEDIATOR_LOG_LEVEL: 'silent',
      MEDIATOR_ENV: 'test',
    },
  },
});
