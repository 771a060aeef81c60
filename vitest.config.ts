import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['inventory-pipeline/tests/**/*.test.ts'],
    setupFiles: ['./inventory-pipeline/tests/setupEnv.ts'],
  },
});
