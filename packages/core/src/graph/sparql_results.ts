import { z } from 'zod'
import type { QueryOutcome, SolutionRow } from './engine'

const XSD_STRING = 'http://www.w3.org/2001/XMLSchema#string'

export type RdfTermJson =
    | { type: 'uri'; value: string }
    | { type: 'bnode'; value: string }
    | { type: 'literal'; value: string; 'xml:lang'?: string; datatype?: string }
    | {
          type: 'triple'
          value: { subject: RdfTermJson; predicate: RdfTermJson; object: RdfTermJson }
      }

const termSchema: z.ZodType<RdfTermJson> = z.lazy(() =>
    z.union([
        z.object({ type: z.literal('uri'), value: z.string() }),
        z.object({ type: z.literal('bnode'), value: z.string() }),
        z.object({
            type: z.literal('literal'),
            value: z.string(),
            'xml:lang': z.string().optional(),
            datatype: z.string().optional(),
        }),
        z.object({
            type: z.literal('triple'),
            value: z.object({
                subject: termSchema,
                predicate: termSchema,
                object: termSchema,
            }),
        }),
    ]),
)

const selectResultsSchema = z.object({
    head: z.object({ vars: z.array(z.string()) }),
    results: z.object({ bindings: z.array(z.record(termSchema)) }),
})

const askResultsSchema = z.object({
    head: z.object({}).passthrough(),
    boolean: z.boolean(),
})

function escapeLiteral(value: string): string {
    return value.replace(/[\\"\n\r\t]/g, (ch) => {
        switch (ch) {
            case '\\':
                return '\\\\'
            case '"':
                return '\\"'
            case '\n':
                return '\\n'
            case '\r':
                return '\\r'
            default:
                return '\\t'
        }
    })
}

/** N-Triples form of a term, e.g. `<http://example.org/a>` or `"5"^^<...#integer>`. */
export function formatTerm(term: RdfTermJson): string {
    switch (term.type) {
        case 'uri':
            return `<${term.value}>`
        case 'bnode':
            return `_:${term.value}`
        case 'literal': {
            const lexical = `"${escapeLiteral(term.value)}"`
            const lang = term['xml:lang']
            if (lang) return `${lexical}@${lang}`
            if (term.datatype && term.datatype !== XSD_STRING) {
                return `${lexical}^^<${term.datatype}>`
            }
            return lexical
        }
        case 'triple': {
            const { subject, predicate, object } = term.value
            return `<< ${formatTerm(subject)} ${formatTerm(predicate)} ${formatTerm(object)} >>`
        }
    }
}

/**
 * Reads a SPARQL 1.1 Query Results JSON document. SELECT results become rows;
 * ASK results carry no table.
 */
export function parseSparqlJsonResults(raw: string): QueryOutcome {
    const json: unknown = JSON.parse(raw)

    const select = selectResultsSchema.safeParse(json)
    if (select.success) {
        const columns = select.data.head.vars
        const rows: SolutionRow[] = select.data.results.bindings.map((binding) => {
            const row: Record<string, string> = {}
            for (const [name, term] of Object.entries(binding)) {
                row[name] = formatTerm(term)
            }
            return row
        })
        return { kind: 'rows', columns, rows }
    }

    const ask = askResultsSchema.safeParse(json)
    if (ask.success) {
        return { kind: 'non_tabular' }
    }

    throw new Error(`Unrecognized query results: ${select.error.issues[0]?.message ?? 'bad shape'}`)
}
