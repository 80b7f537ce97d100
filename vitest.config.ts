import { fileURLToPath } from 'url';

import { defineConfig } from 'vitest/config';

const fromRoot = (path: string) => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    alias: [
      { find: /^@a2a-relay\/protocol$/, replacement: fromRoot('./packages/protocol/src/index.ts') },
      { find: /^@a2a-relay\/core$/, replacement: fromRoot('./packages/core/src/index.ts') },
      { find: /^@a2a-relay\/adapters$/, replacement: fromRoot('./packages/adapters/src/index.ts') },
    ],
  },
  test: {
    include: ['packages/*/src/**/*.test.ts', 'apps/*/src/**/*.test.ts'],
    exclude: ['dist/**', '**/node_modules/**'],
    env: {
      LOG_LEVEL: 'silent',
    },
  },
});
