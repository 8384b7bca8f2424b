import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

/**
 * Vitest configuration for every workspace package.
 *
 * Workspace packages resolve to their TypeScript sources, so tests never
 * need a build first.
 */
const source = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@lsmgen/core': source('./core/src/index.ts'),
      '@lsmgen/observability': source('./observability/src/index.ts'),
      '@lsmgen/config': source('./config/src/index.ts'),
      '@lsmgen/test-utils': source('./test-utils/src/index.ts'),
      '@lsmgen/manifest': source('./manifest/src/index.ts'),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['*/src/__tests__/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['*/src/**/*.ts'],
      exclude: ['node_modules/', 'dist/', '**/*.test.ts', '**/__tests__/**'],
      thresholds: {
        statements: 70,
        branches: 65,
        functions: 70,
        lines: 70,
      },
    },
  },
});
