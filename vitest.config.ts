import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/tests/**/*.test.ts', 'src/cli/tests/**/*.test.ts'],
    // the router tests spawn the CLI through tsx
    testTimeout: 30_000,
  },
});
