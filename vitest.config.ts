import { defineConfig } from 'vitest/config';

export default defineConfig({
  esbuild: {
    jsx: 'automatic',
  },
  test: {
    environment: 'node',
    include: ['packages/*/__tests__/**/*.test.{ts,tsx}'],
    testTimeout: 15000,
  },
});
