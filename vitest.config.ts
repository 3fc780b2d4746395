import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    // call history only; mock implementations set in vi.mock factories survive
    clearMocks: true,
  },
});
