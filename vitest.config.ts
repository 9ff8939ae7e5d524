import { defineConfig } from 'vitest/config';
import dotenv from 'dotenv';

// Tests read the same .env as the CLI; an explicit environment always wins.
dotenv.config({ quiet: true });

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    globalSetup: ['./tests/global-teardown.ts'],
    testTimeout: 30000,
    hookTimeout: 30000,
  },
});
