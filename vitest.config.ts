import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts', 'apps/*/src/**/*.test.ts'],
  },
  resolve: {
    alias: {
      '@hunkwise/config': fileURLToPath(new URL('./packages/config/src/index.ts', import.meta.url)),
      '@hunkwise/diff': fileURLToPath(new URL('./packages/diff/src/index.ts', import.meta.url)),
    },
  },
});
