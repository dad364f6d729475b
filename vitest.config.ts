import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['backend/test/**/*.spec.ts'],
    setupFiles: ['backend/test/setup-env.ts'],
    clearMocks: true,
    restoreMocks: true,
  },
});
