import { Store } from 'oxigraph'
import {
    GraphEngineError,
    type DatasetFormat,
    type GraphEngine,
    type QueryOutcome,
} from './engine'
import { parseSparqlJsonResults } from './sparql_results'

const SPARQL_RESULTS_JSON = 'application/sparql-results+json'

function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err)
}

/**
 * In-memory SPARQL store backed by Oxigraph.
 *
 * Results are requested as SPARQL JSON so that a SELECT keeps its projected
 * variables even when it has no solutions.
 */
export class OxigraphEngine implements GraphEngine {
    private readonly store: Store

    constructor(store: Store = new Store()) {
        this.store = store
    }

    load(content: string, baseIri: string, format: DatasetFormat): void {
        try {
            this.store.load(content, { format, base_iri: baseIri })
        } catch (err) {
            throw new GraphEngineError('LOAD_FAILED', errorMessage(err))
        }
    }

    execute(query: string): QueryOutcome {
        let raw: unknown
        try {
            raw = this.store.query(query, { results_format: SPARQL_RESULTS_JSON })
        } catch (err) {
            throw new GraphEngineError('QUERY_FAILED', errorMessage(err))
        }

        if (typeof raw !== 'string') {
            return { kind: 'non_tabular' }
        }
        try {
            return parseSparqlJsonResults(raw)
        } catch (err) {
            throw new GraphEngineError('QUERY_FAILED', errorMessage(err))
        }
    }
}
