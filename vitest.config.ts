import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const fromRoot = (relative: string): string => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@statement-kit/types': fromRoot('./packages/types/src/index.ts'),
      '@statement-kit/document-loader': fromRoot('./packages/document-loader/src/index.ts'),
      '@statement-kit/extractors': fromRoot('./packages/extractors/src/index.ts'),
      '@statement-kit/converter': fromRoot('./packages/converter/src/index.ts'),
      '@statement-kit/output': fromRoot('./packages/output/src/index.ts'),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    env: {
      STATEMENT_LOG_LEVEL: 'silent',
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules', 'dist', 'tests'],
    },
  },
});
