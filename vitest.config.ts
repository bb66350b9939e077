import { defineConfig } from 'vitest/config';

// One run over every workspace; tests sit in src/__tests__ beside the code.
export default defineConfig({
  test: {
    include: ['{packages,apps}/*/src/__tests__/*.test.ts'],
    environment: 'node',
    globals: true,
  },
});
