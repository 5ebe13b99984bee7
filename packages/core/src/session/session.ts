import { QueryBuffer } from '../buffer/query_buffer'
import { QUIT_KEY, type KeyEvent, type KeyPress } from './keys'
import { MODES, toggleMode, type Mode } from './mode'

export type ExploreSessionOptions = {
    initialQuery?: string
    initialMode?: Mode
}

/**
 * Root state of an explorer run: the query being edited, the active mode and
 * whether the user asked to leave.
 */
export class ExploreSession {
    readonly buffer: QueryBuffer
    private currentMode: Mode
    private quitRequested = false

    constructor(options: ExploreSessionOptions = {}) {
        this.buffer = new QueryBuffer(options.initialQuery)
        this.currentMode = options.initialMode ?? MODES.BROWSING
    }

    get mode(): Mode {
        return this.currentMode
    }

    get quitting(): boolean {
        return this.quitRequested
    }

    toggleMode(): Mode {
        this.currentMode = toggleMode(this.currentMode)
        return this.currentMode
    }

    quit(): void {
        this.quitRequested = true
    }

    handleKey(event: KeyEvent): void {
        if (event.phase !== 'press') return

        if (this.currentMode === MODES.EDITING) {
            this.handleEditingKey(event.key)
        } else {
            this.handleBrowsingKey(event.key)
        }
    }

    private handleEditingKey(key: KeyPress): void {
        switch (key.type) {
            case 'backspace':
                this.buffer.removeLast()
                return
            case 'enter':
                this.buffer.append('\n')
                return
            case 'tab':
                this.toggleMode()
                return
            case 'char':
                this.buffer.append(key.char)
                return
            case 'other':
                return
        }
    }

    private handleBrowsingKey(key: KeyPress): void {
        if (key.type === 'tab') {
            this.toggleMode()
            return
        }
        if (key.type === 'char' && key.char === QUIT_KEY) {
            this.quit()
        }
    }
}
