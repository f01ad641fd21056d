import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

/**
 * polybench test configuration
 *
 * - Fixed seeds and no retries so a failure reproduces on the next run
 * - Extended timeouts for property-based testing
 * - Workspace packages resolve to their TypeScript sources, no build needed
 */

// Platform-specific pool configuration
const pool = process.platform === 'win32' ? 'threads' : 'forks';

const isCI = process.env.CI === 'true';

export default defineConfig({
  resolve: {
    alias: {
      '@polybench/core': fileURLToPath(
        new URL('./packages/core/src/index.ts', import.meta.url)
      ),
    },
  },
  test: {
    environment: 'node',
    pool,

    setupFiles: ['./test/setup.ts'],

    include: [
      'packages/*/src/**/*.{test,spec}.ts',
      'packages/*/src/**/__tests__/**/*.{test,spec}.ts',
      'test/**/*.test.ts',
    ],
    exclude: ['**/node_modules/**', '**/dist/**', '**/coverage/**'],

    // No retries - surface issues immediately
    retry: 0,

    testTimeout: isCI ? 30000 : 10000,
    hookTimeout: 10000,

    reporters: ['default'],

    coverage: {
      provider: 'v8',
      reportsDirectory: './coverage',
      include: ['packages/*/src/**/*.ts'],
      exclude: [
        'packages/*/src/**/*.{test,spec}.ts',
        'packages/*/src/**/__tests__/**',
      ],
    },

    env: {
      NODE_ENV: 'test',
      TEST_SEED: '424242',
      FC_NUM_RUNS: isCI ? '1000' : '100',
    },
  },
});
