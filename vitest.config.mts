import { defineConfig } from 'vitest/config';
import os from 'os';

// Test files share no state; run them on the threads pool
export default defineConfig({
  test: {
    globals: true,
    environment: 'node',

    // Include patterns
    include: [
      'test/**/*.test.ts',
      'packages/**/__tests__/**/*.test.ts',
      'apps/**/__tests__/**/*.test.ts',
    ],

    // Exclude patterns
    exclude: [
      '**/node_modules/**',
      '**/dist/**',
      '**/.{idea,git,cache,output,temp}/**',
    ],

    // ===================================================================
    // PERFORMANCE
    // ===================================================================

    pool: 'threads',
    poolOptions: {
      threads: {
        maxThreads: os.cpus().length,
        minThreads: Math.max(1, Math.floor(os.cpus().length / 2)),
        isolate: true,
      },
    },

    fileParallelism: true,

    testTimeout: 30000,
    hookTimeout: 30000,

    // ===================================================================
    // WATCH MODE
    // ===================================================================

    watch: false,

    // ===================================================================
    // MOCKING & STUBBING
    // ===================================================================

    mockReset: true,        // Reset mocks between tests
    restoreMocks: true,     // Restore original implementations
    clearMocks: true,       // Clear mock history

    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'ERROR',
    },
  },
});
