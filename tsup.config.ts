import { defineConfig } from 'tsup'

export default defineConfig({
    entry: {
        index: 'packages/tui/src/cli.tsx',
    },
    outDir: 'dist',
    format: ['esm'],
    target: 'node20',
    dts: false,
    clean: true,
    minify: true,
    sourcemap: false,
    splitting: false,
    bundle: true,
    // Runtime dependencies stay external; oxigraph loads its WebAssembly
    // module from its own package directory.
    external: ['ink', 'oxigraph', 'react', 'string-width', 'zod'],
    esbuildOptions(options) {
        options.jsx = 'automatic'
    },
    banner: {
        js: '#!/usr/bin/env node',
    },
})
