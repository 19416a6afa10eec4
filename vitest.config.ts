import { defineConfig } from 'vitest/config';

/**
 * Vitest configuration shared by every package in the workspace.
 */
export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['*/src/__tests__/**/*.test.ts'],
    // Property tests are CPU-bound; keep them in a single fork
    pool: 'forks',
    poolOptions: {
      forks: {
        singleFork: true,
      },
    },
    testTimeout: 30000,
  },
});
