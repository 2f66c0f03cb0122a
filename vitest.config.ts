/**
 * Vitest Configuration
 * @module vitest.config
 *
 * Test configuration for the NGINX configuration parser.
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Test environment
    globals: true,
    environment: 'node',

    // Test file patterns
    include: ['tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist', '**/*.d.ts'],

    // Setup files
    setupFiles: ['./tests/setup.ts'],

    testTimeout: 10000,

    // Coverage configuration
    coverage: {
      provider: 'v8',
      reporter: ['text', 'text-summary', 'lcov'],
      reportsDirectory: './coverage',
      include: ['src/**/*.ts'],
      exclude: [
        '**/*.d.ts',
        '**/index.ts', // Barrel exports
      ],
      thresholds: {
        lines: 85,
        functions: 85,
        branches: 80,
        statements: 85,
      },
    },

    // Sequence configuration
    sequence: {
      shuffle: false,
      concurrent: false,
    },

    // Mock configuration
    clearMocks: true,
    restoreMocks: true,
  },

  // ESBuild configuration for TypeScript
  esbuild: {
    target: 'node20',
  },
});
