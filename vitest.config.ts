import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    // Test environment
    environment: 'node',

    // Quiet the structured logger unless a test asks for output
    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'silent',
    },

    setupFiles: ['./test/setup/test-setup.ts'],

    // Test patterns
    include: [
      'test/**/*.test.ts',
      'test/**/*.spec.ts'
    ],
    exclude: [
      'node_modules',
      'dist'
    ],

    // Timeout configuration
    testTimeout: 10000,
    hookTimeout: 10000,

    // Coverage configuration
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'lcov'],
      reportsDirectory: './coverage',
      exclude: [
        'node_modules/**',
        'dist/**',
        'test/**',
        'src/types/**',
        'src/index.ts'
      ]
    },

    // Watch mode
    watch: false
  }
});
