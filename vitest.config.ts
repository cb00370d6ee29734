/**
 * Vitest Configuration
 *
 * Runs every Node.js test under tests/. Tests use real temp directories and
 * in-memory stores, so files can run in parallel.
 */

import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    pool: 'forks',
    include: ['tests/**/*.test.ts'],
    sequence: {
      shuffle: false,
    },
    testTimeout: 30000,
  },
})
