export const DEFAULT_QUERY = 'SELECT ?s ?p ?o WHERE { ?s ?p ?o }'

/** Top border, one content line and bottom border. */
export const BASE_PANE_HEIGHT = 3

const NEWLINE = '\n'

const SURROGATE_HIGH_MIN = 0xd800
const SURROGATE_HIGH_MAX = 0xdbff
const SURROGATE_LOW_MIN = 0xdc00
const SURROGATE_LOW_MAX = 0xdfff

function isHighSurrogate(value: number): boolean {
    return value >= SURROGATE_HIGH_MIN && value <= SURROGATE_HIGH_MAX
}

function isLowSurrogate(value: number): boolean {
    return value >= SURROGATE_LOW_MIN && value <= SURROGATE_LOW_MAX
}

function lastCharStart(value: string): number {
    const last = value.length - 1
    if (last <= 0) return last
    if (isLowSurrogate(value.charCodeAt(last)) && isHighSurrogate(value.charCodeAt(last - 1))) {
        return last - 1
    }
    return last
}

export function countNewlines(value: string): number {
    let count = 0
    for (let i = 0; i < value.length; i++) {
        if (value.charCodeAt(i) === 10) count++
    }
    return count
}

/**
 * Editable query text plus the height of the pane that shows it.
 * `height` is kept in step with every edit.
 */
export class QueryBuffer {
    private value: string
    private lines: number

    constructor(initial: string = DEFAULT_QUERY) {
        this.value = initial
        this.lines = BASE_PANE_HEIGHT + countNewlines(initial)
    }

    get text(): string {
        return this.value
    }

    get height(): number {
        return this.lines
    }

    /** Appends typed text; usually one character, but a whole chunk keeps `height` right. */
    append(text: string): void {
        this.value += text
        this.lines += countNewlines(text)
    }

    /** Removes the last code point; `null` when there was nothing to remove. */
    removeLast(): string | null {
        if (this.value.length === 0) return null

        const start = lastCharStart(this.value)
        const removed = this.value.slice(start)
        this.value = this.value.slice(0, start)
        if (removed === NEWLINE) {
            this.lines -= 1
        }
        return removed
    }
}
