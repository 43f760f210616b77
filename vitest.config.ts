import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts', 'apps/*/src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    testTimeout: 20000,
  },
  resolve: {
    alias: {
      '@collage/utils': fileURLToPath(new URL('./packages/utils/src/index.ts', import.meta.url)),
      '@collage/core': fileURLToPath(new URL('./packages/collage/src/index.ts', import.meta.url)),
    },
  },
});
