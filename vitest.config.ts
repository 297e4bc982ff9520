import path from 'path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@libs/core': path.resolve(__dirname, 'libs/core/src'),
      '@libs/prices': path.resolve(__dirname, 'libs/prices/src'),
      '@libs/quotes': path.resolve(__dirname, 'libs/quotes/src'),
    },
  },
  test: {
    environment: 'node',
    include: ['test/**/*.spec.ts'],
  },
});
