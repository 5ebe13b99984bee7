export type CliOptions = {
    showHelp: boolean
    showVersion: boolean
}

export type ParsedArgs = {
    /** Dataset to load before the session starts. */
    path: string | null
    options: CliOptions
    /** Arguments that do not fit the command line; any entry is a usage error. */
    unexpected: string[]
}

export const USAGE = `Usage: rdf-explorer [options] [path]

Explore an RDF graph with live SPARQL queries.

Arguments:
  path             Turtle file to load before the session starts

Options:
  -h, --help       Show this help
  -v, --version    Show the version

Keys:
  Tab              Switch between editing the query and browsing results
  q                Quit (while browsing)`

/** Minimal argv parsing for the explorer CLI. */
export function parseArgs(argv: string[]): ParsedArgs {
    const options: CliOptions = {
        showHelp: false,
        showVersion: false,
    }
    const positionals: string[] = []
    const unexpected: string[] = []
    let afterSeparator = false

    for (const arg of argv) {
        if (afterSeparator) {
            positionals.push(arg)
            continue
        }
        if (arg === '--') {
            afterSeparator = true
            continue
        }
        if (arg === '--help' || arg === '-h') {
            options.showHelp = true
            continue
        }
        if (arg === '--version' || arg === '-v') {
            options.showVersion = true
            continue
        }
        if (arg.startsWith('-') && arg !== '-') {
            unexpected.push(arg)
            continue
        }
        positionals.push(arg)
    }

    const [path = null, ...extra] = positionals
    return { path, options, unexpected: [...unexpected, ...extra] }
}
