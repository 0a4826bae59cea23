import { defineConfig, defaultExclude } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['apps/*/src/**/*.test.ts'],
    exclude: [...defaultExclude, 'dist/**'],
  },
});
