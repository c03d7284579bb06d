import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'jsdom',
    include: ['**/__tests__/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['**/core/**', '**/utils/**', '**/hooks/**'],
      exclude: ['**/__tests__/**'],
    },
  },
});
