export const DATASET_FORMATS = {
    TURTLE: 'text/turtle',
} as const

export type DatasetFormat = (typeof DATASET_FORMATS)[keyof typeof DATASET_FORMATS]

/** One solution, keyed by variable name. Unbound variables are absent. */
export type SolutionRow = Readonly<Record<string, string | undefined>>

export type QueryOutcome =
    | { kind: 'rows'; columns: string[]; rows: SolutionRow[] }
    | { kind: 'non_tabular' }

export class GraphEngineError extends Error {
    constructor(
        readonly code: 'LOAD_FAILED' | 'QUERY_FAILED',
        message: string,
    ) {
        super(message)
        this.name = 'GraphEngineError'
    }
}

/** Graph storage plus synchronous query execution. */
export interface GraphEngine {
    load(content: string, baseIri: string, format: DatasetFormat): void
    execute(query: string): QueryOutcome
}
