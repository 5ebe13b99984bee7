import type { EventEmitter } from 'node:events'

const ESC = '\x1b'

export const TERMINAL_SEQUENCES = {
    ENTER_ALT_SCREEN: `${ESC}[?1049h`,
    LEAVE_ALT_SCREEN: `${ESC}[?1049l`,
    HIDE_CURSOR: `${ESC}[?25l`,
    SHOW_CURSOR: `${ESC}[?25h`,
} as const

export type TerminalOutput = {
    write(chunk: string): unknown
}

export type TerminalInput = {
    isTTY?: boolean
    setRawMode?: (mode: boolean) => unknown
}

export type AcquireTerminalOptions = {
    output: TerminalOutput
    input?: TerminalInput
    /** Usually `process`; the guard restores the terminal on its exit and crash events. */
    host?: EventEmitter
}

export type TerminalHandle = {
    readonly active: boolean
    /** Restores the terminal. Returns the first failure instead of throwing it. */
    release(): Error | null
}

const RELEASE_EVENTS = ['exit', 'uncaughtExceptionMonitor'] as const

function toError(err: unknown): Error {
    return err instanceof Error ? err : new Error(String(err))
}

/**
 * Switches to the alternate screen for the lifetime of the returned handle.
 * Releasing is idempotent and also runs when the host process exits or
 * crashes while the handle is held.
 */
export function acquireTerminal({ output, input, host }: AcquireTerminalOptions): TerminalHandle {
    output.write(TERMINAL_SEQUENCES.ENTER_ALT_SCREEN + TERMINAL_SEQUENCES.HIDE_CURSOR)

    let active = true

    const release = (): Error | null => {
        if (!active) return null
        active = false

        for (const event of RELEASE_EVENTS) {
            host?.off(event, onHostExit)
        }

        let failure: Error | null = null
        const attempt = (step: () => unknown) => {
            try {
                step()
            } catch (err) {
                failure ??= toError(err)
            }
        }

        attempt(() => {
            if (input?.isTTY) input.setRawMode?.(false)
        })
        attempt(() =>
            output.write(TERMINAL_SEQUENCES.SHOW_CURSOR + TERMINAL_SEQUENCES.LEAVE_ALT_SCREEN),
        )
        return failure
    }

    function onHostExit() {
        const failure = release()
        if (failure) {
            console.error(`Failed to restore terminal: ${failure.message}`)
        }
    }

    for (const event of RELEASE_EVENTS) {
        host?.on(event, onHostExit)
    }

    return {
        get active() {
            return active
        },
        release,
    }
}
