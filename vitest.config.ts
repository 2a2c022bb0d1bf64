import { defineConfig } from 'vitest/config';
import * as path from 'node:path';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts', 'apps/*/src/**/*.test.ts'],
    env: {
      LOG_LEVEL: 'error',
    },
  },
  resolve: {
    alias: [
      { find: '@core', replacement: path.resolve(__dirname, 'packages', 'core', 'src', 'index.ts') },
    ],
  },
});
