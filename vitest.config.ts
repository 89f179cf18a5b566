import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    exclude: ['**/node_modules/**', '**/dist/**'],
    // Run tests from root - each package keeps tests beside its sources or under tests/
    include: ['packages/*/src/**/*.test.ts', 'packages/*/tests/**/*.test.ts'],
    env: {
      SKIP_ENV_VALIDATION: '1',
    },
  },
})
