import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    include: ['pack-*/tests/**/*.test.ts'],
    env: {
      NODE_ENV: 'test',
    },
    // Config and Logger are process-wide singletons
    fileParallelism: false,
  },
});
