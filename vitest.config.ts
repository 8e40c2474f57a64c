import { fileURLToPath } from 'url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@charm-fleet/shared': fileURLToPath(
        new URL('./packages/shared/src/index.ts', import.meta.url)
      ),
    },
  },
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts', 'app/server/src/**/*.test.ts'],
    env: {
      LOG_LEVEL: 'silent',
    },
  },
});
