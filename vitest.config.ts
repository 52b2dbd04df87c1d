import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['apps/server/tests/**/*.test.ts', 'apps/web/src/**/__tests__/**/*.test.ts'],
    environment: 'node',
  },
});
