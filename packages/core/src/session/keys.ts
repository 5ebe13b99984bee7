/** Keys the session distinguishes; anything else arrives as `other`. */
export type KeyPress =
    | { type: 'char'; char: string }
    | { type: 'enter' }
    | { type: 'tab' }
    | { type: 'backspace' }
    | { type: 'other'; name: string }

export type KeyPhase = 'press' | 'repeat' | 'release'

export type KeyEvent = {
    phase: KeyPhase
    key: KeyPress
}

export const QUIT_KEY = 'q'

export function pressed(key: KeyPress): KeyEvent {
    return { phase: 'press', key }
}
