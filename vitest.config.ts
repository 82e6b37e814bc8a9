import { defineConfig } from 'vitest/config';

/**
 * Vitest configuration for langsense
 *
 * Tests live in `__tests__` directories beside the sources. Snapshot tests
 * write real files under the OS temp directory, so forks keep each file's
 * workspace isolated.
 */
export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    testTimeout: 30000,
    hookTimeout: 10000,
    pool: 'forks',
  },
});
