import { fileURLToPath } from 'node:url'
import { defineConfig } from 'vitest/config'

export default defineConfig({
  resolve: {
    alias: {
      '@shardrun/matrix-runner-core': fileURLToPath(
        new URL('./packages/matrix-runner-core/src/index.ts', import.meta.url)
      ),
    },
  },
  test: {
    include: ['packages/*/test/**/*.test.ts'],
    environment: 'node',
    testTimeout: 10000,
  },
})
