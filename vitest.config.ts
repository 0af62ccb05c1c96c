import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    pool: 'forks',
    include: ['packages/*/src/**/__tests__/**/*.test.ts'],
    coverage: {
      reporter: ['text', 'json', 'html'],
    },
  },
  resolve: {
    alias: {
      '@liks/system': new URL('./packages/system/src/index.ts', import.meta.url).pathname,
      '@liks/swarm-engine': new URL('./packages/swarm-engine/src/index.ts', import.meta.url).pathname,
    },
  },
})
