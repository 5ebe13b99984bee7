import assert from 'node:assert'
import { describe, test } from 'vitest'
import { DEFAULT_QUERY } from '../buffer/query_buffer'
import { MODES } from '../session/mode'
import {
    centerLine,
    clipToWidth,
    composeFrame,
    fitToWidth,
    layoutTable,
    splitWidth,
    type FrameInput,
} from './compose'

function frameInput(overrides: Partial<FrameInput> = {}): FrameInput {
    return {
        mode: MODES.BROWSING,
        query: { text: DEFAULT_QUERY, height: 3 },
        view: { kind: 'empty' },
        size: { columns: 40, rows: 12 },
        ...overrides,
    }
}

describe('splitWidth', () => {
    test('gives leading columns the remainder', () => {
        assert.deepStrictEqual(splitWidth(36, 3), [12, 11, 11])
        assert.deepStrictEqual(splitWidth(10, 2), [5, 4])
    })

    test('never goes negative', () => {
        assert.deepStrictEqual(splitWidth(0, 3), [0, 0, 0])
        assert.deepStrictEqual(splitWidth(5, 0), [])
    })
})

describe('cell fitting', () => {
    test('clips by display width', () => {
        assert.strictEqual(clipToWidth('<http://example.org/a>', 6), '<http:')
        assert.strictEqual(clipToWidth('日本語', 5), '日本')
        assert.strictEqual(clipToWidth('abc', 0), '')
    })

    test('pads short values', () => {
        assert.strictEqual(fitToWidth('s', 4), 's   ')
        assert.strictEqual(fitToWidth('日本語', 5), '日本 ')
    })

    test('centers a line', () => {
        assert.strictEqual(centerLine('NO RESULT', 36), `${' '.repeat(13)}NO RESULT`)
        assert.strictEqual(centerLine('NO RESULT', 4), 'NO R')
    })
})

describe('layoutTable', () => {
    test('drops rows that do not fit below the header', () => {
        const layout = layoutTable(['a'], [['1'], ['2'], ['3']], 3, 3)
        assert.deepStrictEqual(layout, {
            widths: [3],
            header: 'a  ',
            rows: ['1  ', '2  '],
        })
    })

    test('fills missing cells with blanks', () => {
        const layout = layoutTable(['a', 'b'], [['1']], 5, 4)
        assert.deepStrictEqual(layout.rows, ['1    '])
    })
})

describe('composeFrame', () => {
    test('sizes the query pane to the buffer and gives the rest to Explore', () => {
        const frame = composeFrame(frameInput({ query: { text: 'SELECT *\nWHERE {}', height: 4 } }))
        assert.strictEqual(frame.query.height, 4)
        assert.strictEqual(frame.explore.height, 8)
        assert.deepStrictEqual(frame.query.lines, ['SELECT *', 'WHERE {}'])
        assert.strictEqual(frame.query.title, 'Query')
        assert.strictEqual(frame.explore.title, 'Explore')
    })

    test('highlights only the pane of the active mode', () => {
        const editing = composeFrame(frameInput({ mode: MODES.EDITING }))
        assert.strictEqual(editing.query.highlighted, true)
        assert.strictEqual(editing.explore.highlighted, false)

        const browsing = composeFrame(frameInput({ mode: MODES.BROWSING }))
        assert.strictEqual(browsing.query.highlighted, false)
        assert.strictEqual(browsing.explore.highlighted, true)
    })

    test('mode never changes pane content', () => {
        const view = { kind: 'table' as const, columns: ['s'], rows: [['<a>']] }
        const editing = composeFrame(frameInput({ mode: MODES.EDITING, view }))
        const browsing = composeFrame(frameInput({ mode: MODES.BROWSING, view }))
        assert.deepStrictEqual(editing.query.lines, browsing.query.lines)
        assert.deepStrictEqual(editing.explore.content, browsing.explore.content)
    })

    test('lays out an empty result table with its header', () => {
        const frame = composeFrame(
            frameInput({ view: { kind: 'table', columns: ['s', 'p', 'o'], rows: [] } }),
        )
        assert.deepStrictEqual(frame.explore.content, {
            kind: 'table',
            widths: [12, 11, 11],
            header: `${'s'.padEnd(12)} ${'p'.padEnd(11)} ${'o'.padEnd(11)}`,
            rows: [],
        })
    })

    test('centers NO RESULT for the empty view', () => {
        const frame = composeFrame(frameInput())
        assert.deepStrictEqual(frame.explore.content, {
            kind: 'empty',
            line: `${' '.repeat(13)}NO RESULT`,
        })
    })

    test('clamps the query pane to a short terminal', () => {
        const frame = composeFrame(
            frameInput({ query: { text: 'a\nb\nc\nd', height: 6 }, size: { columns: 20, rows: 4 } }),
        )
        assert.strictEqual(frame.query.height, 4)
        assert.strictEqual(frame.explore.height, 0)
        assert.deepStrictEqual(frame.query.lines, ['a', 'b'])
    })

    test('composes a zero-sized frame with an empty buffer', () => {
        const frame = composeFrame(
            frameInput({
                query: { text: '', height: 3 },
                view: { kind: 'table', columns: ['s', 'p'], rows: [['<a>', '<b>']] },
                size: { columns: 0, rows: 0 },
            }),
        )
        assert.strictEqual(frame.query.height, 0)
        assert.strictEqual(frame.explore.height, 0)
        assert.deepStrictEqual(frame.query.lines, [])
        assert.deepStrictEqual(frame.explore.content, {
            kind: 'table',
            widths: [0, 0],
            header: '',
            rows: [],
        })
    })
})
