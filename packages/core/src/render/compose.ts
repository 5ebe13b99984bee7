import stringWidth from 'string-width'
import type { QueryView } from '../graph/bridge'
import { MODES, type Mode } from '../session/mode'

export const PANE_TITLES = {
    QUERY: 'Query',
    EXPLORE: 'Explore',
} as const

export const NO_RESULT = 'NO RESULT'

const BORDER_SIZE = 2
const EXPLORE_PADDING_X = 1
const HEADER_ROWS = 1
export const COLUMN_SPACING = 1

export type FrameSize = {
    columns: number
    rows: number
}

export type PaneModel = {
    title: string
    width: number
    height: number
    highlighted: boolean
}

export type TableLayout = {
    widths: number[]
    header: string
    rows: string[]
}

export type ExploreContent =
    | ({ kind: 'table' } & TableLayout)
    | { kind: 'empty'; line: string }

export type QueryPaneModel = PaneModel & { lines: string[] }

export type ExplorePaneModel = PaneModel & {
    paddingX: number
    content: ExploreContent
}

export type FrameModel = {
    query: QueryPaneModel
    explore: ExplorePaneModel
}

export type FrameInput = {
    mode: Mode
    query: { text: string; height: number }
    view: QueryView
    size: FrameSize
}

function toCells(value: number): number {
    if (!Number.isFinite(value) || value <= 0) return 0
    return Math.floor(value)
}

/** Clips `text` to `width` terminal cells without padding. */
export function clipToWidth(text: string, width: number): string {
    if (width <= 0) return ''
    let used = 0
    let out = ''
    for (const ch of text) {
        const w = stringWidth(ch)
        if (used + w > width) break
        used += w
        out += ch
    }
    return out
}

/** Clips or pads `text` to exactly `width` terminal cells. */
export function fitToWidth(text: string, width: number): string {
    const clipped = clipToWidth(text, width)
    return clipped + ' '.repeat(Math.max(0, width - stringWidth(clipped)))
}

/** Shares `total` cells equally between columns; leading columns take the remainder. */
export function splitWidth(total: number, count: number, spacing = COLUMN_SPACING): number[] {
    if (count <= 0) return []
    const available = Math.max(0, total - spacing * (count - 1))
    const base = Math.floor(available / count)
    const remainder = available - base * count
    return Array.from({ length: count }, (_, index) => base + (index < remainder ? 1 : 0))
}

export function layoutTable(
    columns: string[],
    rows: string[][],
    width: number,
    height: number,
): TableLayout {
    const widths = splitWidth(width, columns.length)
    const gap = ' '.repeat(COLUMN_SPACING)
    const joinRow = (cells: string[]) =>
        widths.map((w, index) => fitToWidth(cells[index] ?? '', w)).join(gap)

    const visible = Math.max(0, height - HEADER_ROWS)
    const shown = rows.slice(0, visible)
    return {
        widths,
        header: height > 0 ? joinRow(columns) : '',
        rows: shown.map(joinRow),
    }
}

export function centerLine(text: string, width: number): string {
    const clipped = clipToWidth(text, width)
    const left = Math.floor((width - stringWidth(clipped)) / 2)
    return ' '.repeat(Math.max(0, left)) + clipped
}

/**
 * Lays out one full frame: the Query pane sized to the buffer on top and the
 * Explore pane filling the rest. Mode only decides which border is lit.
 */
export function composeFrame({ mode, query, view, size }: FrameInput): FrameModel {
    const width = toCells(size.columns)
    const rows = toCells(size.rows)

    const queryHeight = Math.min(toCells(query.height), rows)
    const exploreHeight = rows - queryHeight

    const queryInnerWidth = Math.max(0, width - BORDER_SIZE)
    const queryLines = query.text
        .split('\n')
        .slice(0, Math.max(0, queryHeight - BORDER_SIZE))
        .map((line) => clipToWidth(line, queryInnerWidth))

    const exploreInnerWidth = Math.max(0, width - BORDER_SIZE - EXPLORE_PADDING_X * 2)
    const exploreInnerHeight = Math.max(0, exploreHeight - BORDER_SIZE)
    const content: ExploreContent =
        view.kind === 'table'
            ? {
                  kind: 'table',
                  ...layoutTable(view.columns, view.rows, exploreInnerWidth, exploreInnerHeight),
              }
            : { kind: 'empty', line: centerLine(NO_RESULT, exploreInnerWidth) }

    return {
        query: {
            title: PANE_TITLES.QUERY,
            width,
            height: queryHeight,
            highlighted: mode === MODES.EDITING,
            lines: queryLines,
        },
        explore: {
            title: PANE_TITLES.EXPLORE,
            width,
            height: exploreHeight,
            highlighted: mode === MODES.BROWSING,
            paddingX: EXPLORE_PADDING_X,
            content,
        },
    }
}
