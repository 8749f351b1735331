import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['apps/*/src/**/*.test.ts'],
    setupFiles: ['apps/backend/src/test/setup.ts'],
    environment: 'node',
    testTimeout: 30_000,
  },
});
