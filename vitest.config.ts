import { resolve } from 'node:path';

import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@tabula/core': resolve(__dirname, 'packages/core/src/index.ts'),
      '@tabula/codegen': resolve(__dirname, 'packages/codegen/src/index.ts'),
    },
  },
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
  },
});
