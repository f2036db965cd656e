import { fileURLToPath } from 'node:url'
import { defineConfig } from 'vitest/config'

const source = (pkg: string): string =>
  fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url))

export default defineConfig({
  resolve: {
    alias: {
      '@stint/core': source('core'),
      '@stint/runtime-host': source('runtime-host'),
      '@stint/cli': source('cli'),
    },
  },
  test: {
    include: ['packages/*/test/**/*.test.ts'],
  },
})
