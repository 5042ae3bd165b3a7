import { defineConfig } from 'vitest/config'
import path from 'path'
import { fileURLToPath } from 'url'

const dirname = path.dirname(fileURLToPath(import.meta.url))

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
  },
  resolve: {
    alias: {
      '@user-registry/domain': path.resolve(dirname, '../domain/src/index.ts'),
      '@user-registry/api': path.resolve(dirname, '../api/src/index.ts'),
    },
  },
})
