import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const repoRoot = path.dirname(fileURLToPath(import.meta.url));
const alias = {
  '@libs/http-client-core': path.resolve(repoRoot, 'libs/http-client-core/src/index.ts'),
  '@libs/crossref-client': path.resolve(repoRoot, 'libs/crossref-client/src/index.ts'),
};

export default defineConfig({
  test: {
    environment: 'node',
    globals: true,
    include: ['libs/*/src/**/__tests__/**/*.test.ts'],
  },
  resolve: {
    alias,
  },
});
