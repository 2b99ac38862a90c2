import { defineConfig } from 'vitest/config';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@wasmrig/core': path.resolve(root, 'packages/core/src/index.ts'),
      '@wasmrig/build': path.resolve(root, 'packages/build/src/index.ts'),
      '@wasmrig/test-runner': path.resolve(root, 'packages/test-runner/src/index.ts'),
    },
  },
  test: {
    environment: 'node',
    pool: 'forks',
    include: ['packages/*/src/**/*.{test,spec}.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules/', 'dist/', '**/*.d.ts', '**/*.config.*'],
    },
  },
});
