import { pressed, type KeyEvent } from '@rdf-explorer/core'

/** The subset of Ink's `Key` the explorer reads. */
export type KeyLike = {
    return?: boolean
    tab?: boolean
    backspace?: boolean
    delete?: boolean
    escape?: boolean
    ctrl?: boolean
    meta?: boolean
    upArrow?: boolean
    downArrow?: boolean
    leftArrow?: boolean
    rightArrow?: boolean
    pageUp?: boolean
    pageDown?: boolean
}

const ASCII_BS = '\u0008'
const ASCII_DEL = '\u007f'

const NAMED_KEYS = [
    'escape',
    'upArrow',
    'downArrow',
    'leftArrow',
    'rightArrow',
    'pageUp',
    'pageDown',
] as const

export function isBackspace(input: string, key: KeyLike): boolean {
    const isBackspaceChar = input === ASCII_BS || input === ASCII_DEL
    const isCtrlHBackspace = Boolean(key.ctrl) && input.toLowerCase() === 'h'
    if (Boolean(key.backspace) || isBackspaceChar || isCtrlHBackspace) return true

    // Ink v5 reports the \x7f most terminals send for Backspace as key.delete,
    // so an unmodified delete is treated as Backspace.
    return Boolean(key.delete) && !(key.ctrl || key.meta)
}

function isPrintable(char: string): boolean {
    const code = char.codePointAt(0) ?? 0
    return code >= 0x20 && code !== 0x7f
}

/**
 * Splits typed or pasted text into one event per code point. Line endings
 * become Enter, other control characters are dropped.
 */
export function textToKeyEvents(text: string): KeyEvent[] {
    const events: KeyEvent[] = []
    for (const char of text.replace(/\r\n?/g, '\n')) {
        if (char === '\n') {
            events.push(pressed({ type: 'enter' }))
        } else if (isPrintable(char)) {
            events.push(pressed({ type: 'char', char }))
        }
    }
    return events
}

/** Translates one Ink `useInput` callback into session key events. */
export function toKeyEvents(input: string, key: KeyLike): KeyEvent[] {
    if (isBackspace(input, key)) return [pressed({ type: 'backspace' })]
    if (key.tab) return [pressed({ type: 'tab' })]
    if (key.return) return [pressed({ type: 'enter' })]

    const named = NAMED_KEYS.find((name) => key[name])
    if (named) return [pressed({ type: 'other', name: named })]

    if (key.ctrl || key.meta) {
        return [pressed({ type: 'other', name: `${key.ctrl ? 'ctrl' : 'meta'}+${input}` })]
    }
    if (!input) return [pressed({ type: 'other', name: 'unknown' })]

    return textToKeyEvents(input)
}
