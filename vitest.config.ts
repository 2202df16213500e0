import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: false,
    include: ['packages/*/src/**/*.test.ts'],
  },
  resolve: {
    alias: {
      'docket-core': fileURLToPath(new URL('./packages/docket-core/src/index.ts', import.meta.url)),
    },
  },
});
