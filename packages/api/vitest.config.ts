import { defineConfig } from 'vitest/config'
import { fileURLToPath } from 'node:url'

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
  },
  resolve: {
    alias: {
      '@studioledger/domain': fileURLToPath(new URL('../domain/src/index.ts', import.meta.url)),
    },
  },
})
