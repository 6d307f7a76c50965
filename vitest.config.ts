import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@streamcore/types': fileURLToPath(new URL('./packages/types/src/index.ts', import.meta.url)),
      '@streamcore/utils': fileURLToPath(new URL('./packages/utils/src/index.ts', import.meta.url)),
    },
  },
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    restoreMocks: true,
  },
});
