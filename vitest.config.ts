import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['clients/*/tests/**/*.test.ts'],
    environment: 'node'
  }
});
