export const MODES = {
    EDITING: 'editing',
    BROWSING: 'browsing',
} as const

export type Mode = (typeof MODES)[keyof typeof MODES]

export function toggleMode(mode: Mode): Mode {
    return mode === MODES.EDITING ? MODES.BROWSING : MODES.EDITING
}
