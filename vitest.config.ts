import { defineConfig } from 'vitest/config';

/**
 * Pure unit tests: no database, server or network.
 */
export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    globals: false,
    fileParallelism: true,
    testTimeout: 15000,
    environment: 'node',
  },
});
