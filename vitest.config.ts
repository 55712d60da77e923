import { fileURLToPath } from 'url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@mqtt-dashboard/shared/testing': fileURLToPath(new URL('./shared/src/testing/index.ts', import.meta.url)),
      '@mqtt-dashboard/shared': fileURLToPath(new URL('./shared/src/index.ts', import.meta.url)),
    },
  },
  test: {
    environment: 'node',
    include: ['*/src/**/__tests__/**/*.test.ts'],
    reporters: 'default',
    restoreMocks: true,
  },
});
