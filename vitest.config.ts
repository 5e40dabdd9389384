/**
 * Vitest Configuration for revwindow
 *
 * Runs every unit test under tests/ in Node.js. The setup file turns on
 * invariant checking so each mutation in every test is re-verified.
 */

import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    setupFiles: ['tests/setup.ts'],
    environment: 'node',
    sequence: {
      shuffle: false, // Keep deterministic order for debugging
    },
    testTimeout: 30000,
  },
})
