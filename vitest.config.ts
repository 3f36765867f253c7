import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';
import path from 'path';

const projectRoot = path.dirname(fileURLToPath(new URL(import.meta.url)));
const resolveFromRoot = (p: string) => path.join(projectRoot, p);

export default defineConfig({
  test: {
    include: [
      'packages/**/tests/unit/**/*.test.ts',
      'packages/**/tests/integration/**/*.test.ts',
      'packages/**/tests/properties/**/*.test.ts',
      'packages/**/tests/determinism/**/*.test.ts',
    ],
    exclude: ['node_modules', 'dist', '**/node_modules/**', '**/dist/**'],
    environment: 'node',
    globals: true,
    clearMocks: true,
    restoreMocks: true,
    setupFiles: ['tests/setup.ts'],
    testTimeout: 10000,
  },
  resolve: {
    alias: {
      '@rebalancer/utils': resolveFromRoot('packages/utils/src/index.ts'),
      '@rebalancer/core': resolveFromRoot('packages/core/src/index.ts'),
      '@rebalancer/simulation': resolveFromRoot('packages/simulation/src/index.ts'),
      '@rebalancer/cli': resolveFromRoot('packages/cli/src/index.ts'),
    },
  },
});
