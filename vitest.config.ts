import { defineConfig } from 'vitest/config';
import path from 'path';
import { fileURLToPath } from 'url';

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    exclude: ['**/node_modules/**', 'node_modules', 'dist'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules', 'dist', '**/*.test.ts'],
    },
    testTimeout: 30000,
  },
  resolve: {
    alias: {
      '@proposal-eval/shared': path.resolve(rootDir, './src/backend/shared/src/index.ts'),
      '@proposal-eval/scoring-service': path.resolve(
        rootDir,
        './src/backend/proposal-scoring-service/src/index.ts'
      ),
      '@proposal-eval/explainability': path.resolve(
        rootDir,
        './src/backend/explainability-layer/src/index.ts'
      ),
    },
  },
});
