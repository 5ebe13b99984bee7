import type { KeyEvent } from './keys'
import type { ExploreSession } from './session'

/** About 60 frames per second. */
export const POLL_INTERVAL_MS = 16

export type SessionLoopOptions = {
    /** Full repaint of the current session state. */
    onFrame: () => void
    /** Called once, after the tick that saw the quitting flag. */
    onQuit: () => void
    pollIntervalMs?: number
}

/**
 * Drives a session: every tick redraws, then dispatches the key events that
 * arrived since the previous tick, then checks for quit.
 */
export class SessionLoop {
    private pending: KeyEvent[] = []
    private timer: ReturnType<typeof setInterval> | null = null
    private finished = false

    private readonly pollIntervalMs: number

    constructor(
        private readonly session: ExploreSession,
        private readonly options: SessionLoopOptions,
    ) {
        this.pollIntervalMs = options.pollIntervalMs ?? POLL_INTERVAL_MS
    }

    get running(): boolean {
        return this.timer !== null
    }

    enqueue(...events: KeyEvent[]): void {
        if (this.finished) return
        this.pending.push(...events)
    }

    /** Runs one iteration. Returns false once the session has quit. */
    tick(): boolean {
        if (this.finished) return false

        this.options.onFrame()

        const events = this.pending.splice(0)
        for (const event of events) {
            this.session.handleKey(event)
            if (this.session.quitting) break
        }

        if (this.session.quitting) {
            this.finish()
            return false
        }
        return true
    }

    start(): void {
        if (this.timer || this.finished) return
        this.timer = setInterval(() => {
            this.tick()
        }, this.pollIntervalMs)
    }

    stop(): void {
        if (!this.timer) return
        clearInterval(this.timer)
        this.timer = null
    }

    private finish(): void {
        this.finished = true
        this.pending = []
        this.stop()
        this.options.onQuit()
    }
}
