import { readFile } from 'node:fs/promises'
import { resolve } from 'node:path'
import {
    DATASET_FORMATS,
    GraphEngineError,
    type DatasetFormat,
    type GraphEngine,
} from '../graph/engine'

export type DatasetSource = {
    absolutePath: string
    baseIri: string
}

export type LoadedDataset = DatasetSource & {
    format: DatasetFormat
}

export class DatasetLoadError extends Error {
    constructor(
        readonly code: 'NOT_FOUND' | 'READ_FAILED' | 'PARSE_FAILED',
        message: string,
    ) {
        super(message)
        this.name = 'DatasetLoadError'
    }
}

export function resolveDatasetSource(path: string, cwd: string = process.cwd()): DatasetSource {
    const absolutePath = resolve(cwd, path)
    return { absolutePath, baseIri: `file://${absolutePath}` }
}

function readErrorCode(err: unknown): string | undefined {
    if (err && typeof err === 'object' && 'code' in err && typeof err.code === 'string') {
        return err.code
    }
    return undefined
}

async function readDatasetText(absolutePath: string): Promise<string> {
    try {
        return await readFile(absolutePath, 'utf8')
    } catch (err) {
        if (readErrorCode(err) === 'ENOENT') {
            throw new DatasetLoadError('NOT_FOUND', `No such file: ${absolutePath}`)
        }
        const reason = err instanceof Error ? err.message : String(err)
        throw new DatasetLoadError('READ_FAILED', `Cannot read ${absolutePath}: ${reason}`)
    }
}

/** Reads a Turtle file into the engine, using its file:// IRI as the base. */
export async function loadDataset(
    engine: GraphEngine,
    path: string,
    cwd?: string,
): Promise<LoadedDataset> {
    const source = resolveDatasetSource(path, cwd)
    const text = await readDatasetText(source.absolutePath)
    const format = DATASET_FORMATS.TURTLE

    try {
        engine.load(text, source.baseIri, format)
    } catch (err) {
        if (err instanceof GraphEngineError) {
            throw new DatasetLoadError(
                'PARSE_FAILED',
                `Cannot parse ${source.absolutePath}: ${err.message}`,
            )
        }
        throw err
    }

    return { ...source, format }
}
