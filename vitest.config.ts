/**
 * Vitest Configuration for Unit Tests
 *
 * - Node.js test environment
 * - Explicit imports (globals: false)
 * - Sequential test file execution; the server tests bind local ports
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',

    include: ['tests/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],

    setupFiles: ['./tests/vitest-setup.ts'],

    testTimeout: 15000,
    hookTimeout: 10000,

    pool: 'forks',
    fileParallelism: false,

    globals: false,

    clearMocks: true,
    restoreMocks: true
  }
});
