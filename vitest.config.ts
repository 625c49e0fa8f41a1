import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    // One project per package; each sets its own include and setup files
    projects: ['packages/@jetshards/*/vitest.config.ts'],

    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['packages/@jetshards/*/src/**/*.ts'],
      exclude: ['**/__tests__/**'],
    },
  },
})
