import { defineConfig } from 'vitest/config';

/**
 * Vitest configuration for skewcycle.
 *
 * Unit tests live beside the code in __tests__/ directories; end-to-end
 * searches on synthetic data live under test/.
 */
export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts', 'test/**/*.test.ts'],
    testTimeout: 30000,
    pool: 'forks',
  },
});
