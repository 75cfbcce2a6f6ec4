import { defineConfig } from 'vitest/config';

/**
 * Vitest configuration for the fastening advisor.
 *
 * Tests live beside the sources in `__tests__` directories. The setup file
 * silences the logger so command output can be asserted exactly.
 */
export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    setupFiles: ['./vitest.setup.ts'],
    testTimeout: 30000,
    hookTimeout: 10000,
    pool: 'forks',
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules/', 'dist/', '**/*.test.ts', 'vitest.config.ts', 'vitest.setup.ts'],
    },
  },
});
