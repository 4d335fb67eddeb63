import { defineConfig } from 'vitest/config';
import path from 'path';
import { fileURLToPath } from 'url';

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@monthbook/types': path.resolve(root, 'packages/types/src/index.ts'),
      '@monthbook/pdf-extract': path.resolve(root, 'packages/pdf-extract/src/index.ts'),
      '@monthbook/categorizer': path.resolve(root, 'packages/categorizer/src/index.ts'),
      '@monthbook/store': path.resolve(root, 'packages/store/src/index.ts'),
      '@monthbook/sheets': path.resolve(root, 'packages/sheets/src/index.ts'),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules', 'dist', 'tests'],
    },
  },
});
