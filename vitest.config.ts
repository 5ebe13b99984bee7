import { defineConfig } from 'vitest/config'
import tsconfigPaths from 'vite-tsconfig-paths'

export default defineConfig({
    esbuild: {
        jsx: 'automatic',
    },
    test: {
        globals: false,
        environment: 'node',
        include: ['packages/*/src/**/*.test.{ts,tsx}'],
    },
    plugins: [tsconfigPaths()],
})
