import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

// Loads tsx inside synckit worker threads, which Node.js 20 leaves without it.
const registerTsx = fileURLToPath(new URL('./tests/setup/register-tsx.mjs', import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    env: {
      SYNCKIT_EXEC_ARGV: `--import,${registerTsx}`,
    },
    include: ['tests/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: [
        '**/node_modules/**',
        '**/dist/**',
        '**/*.d.ts',
        '**/vitest.config.ts',
        'tests/**',
        'examples/**',

        // Entry points (re-exports only)
        'src/index.ts',
        'src/core/index.ts',
        'src/config/index.ts',
        'src/config/secrets/index.ts',

        // Runs in a synckit worker thread, which v8 coverage does not follow
        'src/config/secrets/sync-worker.ts',
      ],
      thresholds: {
        statements: 80,
        branches: 75,
        functions: 80,
        lines: 80,
      },
      all: true,
      skipFull: false,
    },
  },
});
