import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts'],
      exclude: ['src/**/*.d.ts', 'src/types/**', 'src/cli/index.ts'],
    },
    // ts-morph and tree-sitter warm-up is slow on cold caches.
    testTimeout: 20000,
    hookTimeout: 20000,
    pool: 'forks',
    sequence: {
      shuffle: false,
    },
  },
});
