import { builtinModules } from 'node:module'
import { fileURLToPath } from 'node:url'

import { defineConfig } from 'vite'

export default defineConfig({
  resolve: {
    alias: {
      '@shardrun/matrix-runner-core': fileURLToPath(
        new URL('../matrix-runner-core/src/index.ts', import.meta.url)
      ),
    },
  },
  build: {
    target: 'node20',
    sourcemap: true,
    outDir: 'bundle',
    lib: {
      entry: 'src/cli.ts',
      formats: ['es'],
      fileName: 'matrix-runner',
    },
    rollupOptions: {
      external: [...builtinModules, /^node:/, 'typescript'],
    },
  },
})
