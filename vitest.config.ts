import { defineConfig } from 'vitest/config';

// CLI files mutate process.exitCode and spy on console; run them one by one
const cliFiles = ['src/cli/**/__tests__/*.test.ts'];

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    exclude: ['node_modules', 'dist', '.git', '.cache'],
    env: {
      SHOPEXT_LOG_LEVEL: 'ERROR',
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'node_modules/',
        'dist/',
        '**/*.test.ts',
        '**/__tests__/**',
        'vitest.config.ts',
      ],
      thresholds: {
        statements: 60,
        branches: 50,
        functions: 60,
        lines: 60,
      },
    },
    projects: [
      {
        extends: true,
        test: {
          name: 'unit',
          include: ['src/**/*.test.ts'],
          exclude: [...cliFiles, 'node_modules', 'dist'],
          pool: 'forks',
          testTimeout: 30000,
          hookTimeout: 30000,
        },
      },
      {
        extends: true,
        test: {
          name: 'cli',
          include: [...cliFiles],
          pool: 'forks',
          fileParallelism: false,
          testTimeout: 60000,
        },
      },
    ],
  },
});
