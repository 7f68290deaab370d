import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Test environment
    environment: 'node',

    // Every test writes into its own temporary directory, so files can run in parallel
    fileParallelism: true,
    maxConcurrency: 4,
    isolate: true,

    // Include patterns
    include: ['tests/**/*.test.ts'],

    // Coverage configuration
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts'],
      exclude: ['src/**/*.d.ts', 'node_modules/**', 'dist/**', 'tests/**'],
    },

    // Timeout for tests that spawn the built binary
    testTimeout: 30000,

    // Global setup - build once before all tests
    globalSetup: ['./tests/setup.ts'],

    // Globals
    globals: true,
  },
});
