import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@shared': fileURLToPath(new URL('./shared', import.meta.url)),
    },
  },
  test: {
    environment: 'node',
    include: ['server/**/__tests__/**/*.test.ts', 'shared/**/__tests__/**/*.test.ts'],
    restoreMocks: true,
  },
});
