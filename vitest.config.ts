import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const resolveFromRoot = (path: string) => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    setupFiles: [resolveFromRoot('./packages/shared/src/__tests__/setup.ts')],

    include: ['packages/*/src/**/*.test.ts'],
    exclude: ['node_modules/**', '**/node_modules/**', 'dist/**'],

    // three.js is loaded per test file; forks keep each copy isolated
    pool: 'forks',

    testTimeout: 30000,
    hookTimeout: 30000,
  },

  resolve: {
    alias: {
      '@waystone/shared': resolveFromRoot('./packages/shared/src/index.ts'),
      '@waystone/travel': resolveFromRoot('./packages/travel/src/index.ts'),
    },
  },
});
