import { defineConfig } from 'vitest/config';

// Environment detection for CI-aware configuration
const isCI = !!(process.env.CI || process.env.GITHUB_ACTIONS || process.env.CONTINUOUS_INTEGRATION);

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',

    // Tests spawn real child processes; leave headroom in CI
    testTimeout: isCI ? 30000 : 15000,
    hookTimeout: isCI ? 15000 : 10000,
    teardownTimeout: isCI ? 10000 : 3000,

    pool: 'forks',
    fileParallelism: true,

    include: [
      'src/**/*.{test,spec}.ts',
      'test/**/*.{test,spec}.ts'
    ],

    setupFiles: ['./src/test-setup.ts'],

    reporters: ['default'],

    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      exclude: [
        'node_modules/',
        'test/',
        'src/**/*.test.ts',
        'src/test-setup.ts',
        'src/bin.ts'
      ]
    }
  }
});
