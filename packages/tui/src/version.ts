import { readFileSync } from 'node:fs'
import { dirname, join } from 'node:path'
import { fileURLToPath } from 'node:url'
import { z } from 'zod'

const manifestSchema = z.object({
    name: z.string().min(1),
    version: z.string().min(1),
})

export type PackageInfo = z.infer<typeof manifestSchema>

/** The bundled CLI sits beside the root manifest; sources sit under the tui workspace. */
const EXPLORER_PACKAGES: readonly string[] = ['rdf-explorer', '@rdf-explorer/tui']

const MODULE_DIR = dirname(fileURLToPath(import.meta.url))

function* ancestors(start: string): Generator<string> {
    let dir = start
    while (true) {
        yield dir
        const parent = dirname(dir)
        if (parent === dir) return
        dir = parent
    }
}

/** Reads `dir/package.json`; `null` when it is missing, unreadable or lacks a name and version. */
export function readManifest(dir: string): PackageInfo | null {
    let raw: string
    try {
        raw = readFileSync(join(dir, 'package.json'), 'utf8')
    } catch {
        return null
    }

    let json: unknown
    try {
        json = JSON.parse(raw)
    } catch {
        return null
    }

    const parsed = manifestSchema.safeParse(json)
    return parsed.success ? { name: parsed.data.name, version: parsed.data.version } : null
}

/** Walks up from `startDir` to the explorer's own package.json. */
export function findLocalPackageInfoSync(startDir: string = MODULE_DIR): PackageInfo | null {
    for (const dir of ancestors(startDir)) {
        const info = readManifest(dir)
        if (info && EXPLORER_PACKAGES.includes(info.name)) return info
    }
    return null
}
