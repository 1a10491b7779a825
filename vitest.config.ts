import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const repoRoot = path.dirname(fileURLToPath(import.meta.url));
const alias = {
  '@comtrade/http-core': path.resolve(repoRoot, 'libs/http-core/src/index.ts'),
  '@comtrade/client': path.resolve(repoRoot, 'libs/comtrade-client/src/index.ts'),
};

export default defineConfig({
  test: {
    environment: 'node',
    globals: true,
    include: ['libs/*/src/__tests__/**/*.test.ts'],
  },
  resolve: {
    alias,
  },
});
