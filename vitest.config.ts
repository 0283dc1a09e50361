import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['backend/src/**/*.test.ts', 'shared/src/**/*.test.ts'],
    environment: 'node',
    restoreMocks: true,
  },
});
