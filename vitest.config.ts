import { defineConfig } from 'vitest/config';
import path from 'path';

export default defineConfig({
  test: {
    // Test environment
    environment: 'node',

    // Global test timeout
    testTimeout: 30000,

    // Setup file to run before tests
    setupFiles: ['./tests/setup.ts'],

    // Include test patterns
    include: ['tests/**/*.test.ts'],

    exclude: ['node_modules', 'dist', 'build', '.strapi'],

    // Coverage configuration
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts'],
      exclude: ['src/admin/**', '**/*.d.ts'],
    },

    // Global variables for tests
    globals: true,

    // Resolve aliases to match project structure
    alias: {
      '@': path.resolve(__dirname, './src'),
    },
  },
});
