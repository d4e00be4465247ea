import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Test discovery
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],

    // Environment
    environment: 'node',
    globals: true,

    // Coverage configuration
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'json', 'lcov'],
      include: ['src/lib/**/*.ts', 'src/utils/**/*.ts'],
      exclude: [
        '**/*.test.ts',
        '**/node_modules/**',
        '**/dist/**',
        '**/tests/**',
      ],
    },

    // Mock configuration
    clearMocks: true,
    restoreMocks: true,

    // Setup file
    setupFiles: ['./tests/setup.ts'],

    // Timeout configuration
    testTimeout: 10000,
    hookTimeout: 10000,
  },
});
