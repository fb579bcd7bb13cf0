import { fileURLToPath } from 'url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@alpaca-sdk/resilient-http-core': fileURLToPath(
        new URL('./libs/resilient-http-core/src/index.ts', import.meta.url),
      ),
      '@alpaca-sdk/alpaca-client': fileURLToPath(new URL('./libs/alpaca-client/src/index.ts', import.meta.url)),
    },
  },
  test: {
    environment: 'node',
    include: ['libs/*/src/**/__tests__/*.test.ts'],
  },
});
