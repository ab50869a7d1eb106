import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tracker/tests/**/*.spec.ts'],
    clearMocks: true,
    restoreMocks: true,
  },
})
