import { defineConfig } from 'vitest/config';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@tallyplan/shared': path.resolve(root, '../../shared/src'),
      '@tallyplan/db': path.resolve(root, '../../db/src'),
      '@tallyplan/core': path.resolve(root, '../../core/src'),
    },
  },
  test: {
    environment: 'node',
    globals: true,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json-summary', 'lcov'],
    },
  },
});
