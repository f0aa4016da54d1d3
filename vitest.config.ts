import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@rights-parser/shared': fileURLToPath(new URL('./packages/shared/src/index.ts', import.meta.url)),
      '@rights-parser/database': fileURLToPath(new URL('./packages/database/src/index.ts', import.meta.url))
    }
  },
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts', '*.test.ts'],
    exclude: ['**/node_modules/**', '**/*.integration.test.ts'],
    setupFiles: ['./vitest.setup.ts'],
    testTimeout: 10_000
  }
});
