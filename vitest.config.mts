import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@conftree/parser': fileURLToPath(new URL('./packages/parser/src/index.ts', import.meta.url)),
    },
  },
  test: {
    include: ['packages/*/src/**/__tests__/**/*.test.ts'],
    testTimeout: 30_000,
  },
});
