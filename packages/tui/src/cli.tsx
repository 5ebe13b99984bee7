// CLI entry: load the dataset, then hand the terminal to the explorer session.
import { render } from 'ink'
import { ExploreSession, OxigraphEngine, loadDataset, type GraphEngine } from '@rdf-explorer/core'
import { App } from './App'
import { USAGE, parseArgs, type ParsedArgs } from './cli_args'
import { acquireTerminal } from './terminal/guard'
import { findLocalPackageInfoSync } from './version'

function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err)
}

async function prepareEngine(path: string | null): Promise<GraphEngine | null> {
    const engine = new OxigraphEngine()
    if (!path) return engine

    try {
        await loadDataset(engine, path)
    } catch (err) {
        console.error(`Failed to load dataset: ${errorMessage(err)}`)
        process.exitCode = 1
        return null
    }
    return engine
}

async function runExplorer(parsed: ParsedArgs) {
    const engine = await prepareEngine(parsed.path)
    if (!engine) return

    if (!process.stdin.isTTY || !process.stdout.isTTY) {
        console.error('rdf-explorer needs an interactive terminal.')
        process.exitCode = 1
        return
    }

    const session = new ExploreSession()
    const terminal = acquireTerminal({
        output: process.stdout,
        input: process.stdin,
        host: process,
    })

    try {
        const app = render(<App session={session} engine={engine} />, {
            exitOnCtrlC: false,
            patchConsole: false,
        })
        await app.waitUntilExit()
    } finally {
        const failure = terminal.release()
        if (failure) {
            console.error(`Failed to restore terminal: ${failure.message}`)
        }
    }
}

async function main() {
    const parsed = parseArgs(process.argv.slice(2))

    if (parsed.options.showHelp) {
        console.log(USAGE)
        return
    }
    if (parsed.options.showVersion) {
        const info = findLocalPackageInfoSync()
        console.log(info?.version ?? 'unknown')
        return
    }
    if (parsed.unexpected.length > 0) {
        console.error(`Unexpected argument: ${parsed.unexpected.join(' ')}\n\n${USAGE}`)
        process.exitCode = 1
        return
    }

    await runExplorer(parsed)
}

main().catch((err: unknown) => {
    console.error(`rdf-explorer failed: ${errorMessage(err)}`)
    process.exitCode = 1
})
