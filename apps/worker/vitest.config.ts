import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

export default defineConfig({
  test: {
    environment: 'node',
    setupFiles: ['./tests/setup.ts'],

    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'lcov'],
      reportsDirectory: './coverage',
      include: ['src/**/*.ts'],
      exclude: ['src/server.ts', '**/*.d.ts'],
    },

    include: ['tests/**/*.test.ts'],
    exclude: ['**/node_modules/**'],

    testTimeout: 15000,
    hookTimeout: 15000,
  },
  resolve: {
    alias: {
      '@flowqa/shared': fileURLToPath(new URL('../../packages/shared/src/index.ts', import.meta.url)),
    },
  },
});
