export const HIGHLIGHT_COLOR = 'green' as const

export const FALLBACK_TERMINAL_SIZE = {
    columns: 80,
    rows: 24,
} as const

export const BOX_CHARS = {
    TOP_LEFT: '┌',
    TOP_RIGHT: '┐',
    HORIZONTAL: '─',
} as const

export function paneColor(highlighted: boolean): typeof HIGHLIGHT_COLOR | undefined {
    return highlighted ? HIGHLIGHT_COLOR : undefined
}
