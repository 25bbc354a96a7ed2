import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['runner/**/*.test.ts', 'app-server/**/*.test.ts'],
    environment: 'node',
  },
});
