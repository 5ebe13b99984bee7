import assert from 'node:assert'
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, test } from 'vitest'
import { findLocalPackageInfoSync, readManifest } from './version'

describe('findLocalPackageInfoSync', () => {
    let root: string

    beforeEach(async () => {
        root = await mkdtemp(join(tmpdir(), 'rdf-explorer-version-'))
    })

    afterEach(async () => {
        await rm(root, { recursive: true, force: true })
    })

    test('skips unrelated manifests on the way up', async () => {
        const nested = join(root, 'node_modules', 'other', 'dist')
        await mkdir(nested, { recursive: true })
        await writeFile(
            join(root, 'package.json'),
            JSON.stringify({ name: 'rdf-explorer', version: '1.2.3' }),
        )
        await writeFile(
            join(root, 'node_modules', 'other', 'package.json'),
            JSON.stringify({ name: 'other', version: '9.9.9' }),
        )

        assert.deepStrictEqual(findLocalPackageInfoSync(nested), {
            name: 'rdf-explorer',
            version: '1.2.3',
        })
    })

    test('skips manifests without a usable name and version', async () => {
        const nested = join(root, 'app')
        await mkdir(nested, { recursive: true })
        await writeFile(
            join(root, 'package.json'),
            JSON.stringify({ name: 'rdf-explorer', version: '2.0.0' }),
        )
        await writeFile(join(nested, 'package.json'), JSON.stringify({ name: 'rdf-explorer', version: 7 }))

        assert.strictEqual(readManifest(nested), null)
        assert.deepStrictEqual(findLocalPackageInfoSync(nested), {
            name: 'rdf-explorer',
            version: '2.0.0',
        })
    })

    test('treats unparsable or missing manifests as absent', async () => {
        await writeFile(join(root, 'package.json'), '{ not json')
        assert.strictEqual(readManifest(root), null)
        assert.strictEqual(readManifest(join(root, 'missing')), null)
    })

    test('keeps only the name and version of a manifest', async () => {
        await writeFile(
            join(root, 'package.json'),
            JSON.stringify({ name: 'rdf-explorer', version: '0.3.0', private: true }),
        )
        assert.deepStrictEqual(readManifest(root), { name: 'rdf-explorer', version: '0.3.0' })
    })

    test('finds the workspace manifest when running from sources', () => {
        const info = findLocalPackageInfoSync()
        assert.strictEqual(info?.name, '@rdf-explorer/tui')
    })
})
