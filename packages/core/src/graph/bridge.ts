import type { GraphEngine, QueryOutcome } from './engine'

/** What the Explore pane can show for the current query text. */
export type QueryView =
    | { kind: 'table'; columns: string[]; rows: string[][] }
    | { kind: 'empty' }

export const EMPTY_VIEW: QueryView = { kind: 'empty' }

/**
 * Runs the query text as typed. Failures and non-tabular answers both come
 * back as the empty view; unbound variables render as ''.
 */
export function runQuery(engine: GraphEngine, text: string): QueryView {
    let outcome: QueryOutcome
    try {
        outcome = engine.execute(text)
    } catch {
        // Half-typed queries fail on most frames.
        return EMPTY_VIEW
    }

    if (outcome.kind !== 'rows') return EMPTY_VIEW

    const { columns } = outcome
    return {
        kind: 'table',
        columns,
        rows: outcome.rows.map((row) => columns.map((column) => row[column] ?? '')),
    }
}
