import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'surface-editor',
    environment: 'jsdom',
    include: ['packages/*/src/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/*.d.ts'],
    restoreMocks: true,
  },
});
