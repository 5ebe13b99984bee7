import { useEffect, useRef, useState } from 'react'
import { Box, useApp, useInput, useStdout } from 'ink'
import {
    SessionLoop,
    composeFrame,
    runQuery,
    type ExploreSession,
    type FrameSize,
    type GraphEngine,
} from '@rdf-explorer/core'
import { ExplorePane } from './components/ExplorePane'
import { QueryPane } from './components/QueryPane'
import { FALLBACK_TERMINAL_SIZE } from './constants'
import { toKeyEvents } from './input/keys'

export type AppProps = {
    session: ExploreSession
    engine: GraphEngine
    pollIntervalMs?: number
}

type SizedStream = {
    columns?: number
    rows?: number
}

export function terminalSize(stream: SizedStream): FrameSize {
    return {
        columns: stream.columns ?? FALLBACK_TERMINAL_SIZE.columns,
        rows: stream.rows ?? FALLBACK_TERMINAL_SIZE.rows,
    }
}

export function App({ session, engine, pollIntervalMs }: AppProps) {
    const { exit } = useApp()
    const { stdout } = useStdout()
    // Bumped once per tick so every tick redraws and re-runs the query.
    const [, setTick] = useState(0)

    const loopRef = useRef<SessionLoop | null>(null)
    if (!loopRef.current) {
        loopRef.current = new SessionLoop(session, {
            onFrame: () => setTick((tick) => tick + 1),
            onQuit: () => exit(),
            pollIntervalMs,
        })
    }
    const loop = loopRef.current

    useEffect(() => {
        loop.start()
        return () => loop.stop()
    }, [loop])

    useInput((input, key) => {
        loop.enqueue(...toKeyEvents(input, key))
    })

    const view = runQuery(engine, session.buffer.text)
    const frame = composeFrame({
        mode: session.mode,
        query: { text: session.buffer.text, height: session.buffer.height },
        view,
        size: terminalSize(stdout),
    })

    return (
        <Box flexDirection="column" width={frame.query.width}>
            <QueryPane pane={frame.query} />
            <ExplorePane pane={frame.explore} />
        </Box>
    )
}
