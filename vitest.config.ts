import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const pkg = (name: string): string =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@invoice-bridge/contracts': pkg('contracts'),
      '@invoice-bridge/shared': pkg('shared'),
      '@invoice-bridge/parser': pkg('parser'),
      '@invoice-bridge/transformer': pkg('transformer'),
      '@invoice-bridge/coordinator': pkg('coordinator'),
    },
  },
  test: {
    include: ['packages/*/src/**/*.test.ts'],
    environment: 'node',
    testTimeout: 10000,
  },
});
