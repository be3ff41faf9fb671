import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@app/contracts': path.resolve(rootDir, 'packages/contracts/src/index.ts'),
      '@app/providers-core': path.resolve(rootDir, 'packages/providers/core/src/index.ts'),
      '@app/providers-beatsource': path.resolve(rootDir, 'packages/providers/beatsource/src/index.ts'),
    },
  },
  test: {
    include: ['packages/**/test/**/*.test.ts'],
    testTimeout: 30000,
    pool: 'threads',
    env: {
      LOG_LEVEL: 'silent',
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['packages/**/src/**'],
      exclude: [
        '**/test/**',
        '**/*.test.ts',
        '**/node_modules/**',
        '**/dist/**',
      ],
    },
  },
});
