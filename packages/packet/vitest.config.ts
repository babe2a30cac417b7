import { defineConfig } from 'vitest/config'

export default defineConfig({
  root: __dirname,
  resolve: {
    conditions: ['source', 'module', 'import', 'default'],
  },
  test: {
    globals: false,
    include: ['test/**/*.test.ts'],
    coverage: {
      enabled: true,
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: ['src/**/*.d.ts'],
    },
  },
})
