/**
 * Vitest Configuration
 *
 * Unit tests only; nothing here opens a socket or reaches the network.
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'barangay-api',
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules/**', 'dist/**'],

    // Global setup
    setupFiles: ['src/__tests__/setup.ts'],

    testTimeout: 10_000,
    hookTimeout: 10_000,

    globals: true,
    environment: 'node',
    retry: 0,
  },
});
