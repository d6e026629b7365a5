import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['packages/*/tests/**/*.test.ts'],
    environment: 'node',
    env: {
      HEARTH_LOG_LEVEL: 'silent',
    },
    testTimeout: 15000,
  },
})
