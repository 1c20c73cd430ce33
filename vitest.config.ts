/**
 * Vitest Configuration
 * @module vitest.config
 *
 * Test configuration for the configuration interpretation pipeline.
 * Includes path aliases, coverage thresholds, and test environment setup.
 */

import { resolve } from 'path';

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Test environment
    globals: true,
    environment: 'node',

    // Test file patterns
    include: ['tests/**/*.test.ts', 'tests/**/*.spec.ts'],
    exclude: ['node_modules', 'dist', '**/*.d.ts'],

    // Setup files
    setupFiles: ['./tests/setup.ts'],

    // Timeout configuration
    testTimeout: 30000,
    hookTimeout: 30000,

    // Coverage configuration
    coverage: {
      provider: 'v8',
      reporter: ['text', 'text-summary', 'json-summary', 'lcov'],
      reportsDirectory: './coverage',
      include: ['src/**/*.ts'],
      exclude: [
        'node_modules/',
        'dist/',
        '**/*.d.ts',
        '**/index.ts', // Barrel exports
        'src/types/**/*.ts', // Type definitions
        'tests/**/*.ts',
      ],
      thresholds: {
        lines: 80,
        functions: 80,
        branches: 75,
        statements: 80,
      },
    },

    // Pool configuration for parallel execution
    pool: 'threads',

    // Sequence configuration
    sequence: {
      shuffle: false,
      concurrent: false,
    },

    // Mock configuration
    mockReset: true,
    clearMocks: true,
    restoreMocks: true,
  },

  // Path resolution
  resolve: {
    alias: {
      '@': resolve(__dirname, './src'),
    },
  },

  // ESBuild configuration for TypeScript
  esbuild: {
    target: 'node20',
  },
});
