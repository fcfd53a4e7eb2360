/**
 * Vitest Configuration
 *
 * Unit tests only; fixtures are built in-process with better-sqlite3.
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'dataset-profiler',
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    environment: 'node',
    // better-sqlite3 is a native module; forks isolate it per file
    pool: 'forks',
    testTimeout: 15_000,
    retry: 0,
  },
});
