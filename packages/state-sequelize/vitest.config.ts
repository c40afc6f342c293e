import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

export default defineConfig({
  resolve: {
    alias: {
      '@customer360/core': fileURLToPath(new URL('../core/src/index.ts', import.meta.url)),
    },
  },
  test: {
    name: 'state-sequelize',
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
  },
});
