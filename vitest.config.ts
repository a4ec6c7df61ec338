import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    // better-sqlite3 and hnswlib-node are native addons
    pool: 'forks',
    testTimeout: 20000,
  },
});
