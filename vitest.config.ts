import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const fromRoot = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  test: {
    environment: 'node',
    setupFiles: ['./packages/api-client/tests/setup.ts'],

    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'lcov'],
      reportsDirectory: './coverage',
      include: ['packages/*/src/**/*.ts'],
      exclude: ['packages/mcp-bridge/src/index.ts', '**/*.d.ts'],
    },

    include: ['packages/*/tests/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
  },
  resolve: {
    alias: {
      '@hostpanel/shared': fromRoot('./packages/shared/src/index.ts'),
      '@hostpanel/api-client': fromRoot('./packages/api-client/src/index.ts'),
    },
  },
});
