import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@bundlekeeper/core': fileURLToPath(new URL('./packages/core/src/index.ts', import.meta.url))
    }
  },
  test: {
    include: ['packages/*/test/**/*.test.ts'],
    environment: 'node',
    env: {
      BUNDLEKEEPER_LOG_LEVEL: 'error'
    }
  }
});
