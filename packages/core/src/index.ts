/**
 * Terminal-free core of the explorer: query buffer, mode state machine,
 * session loop, frame composition and the graph engine boundary.
 */
export { BASE_PANE_HEIGHT, DEFAULT_QUERY, QueryBuffer, countNewlines } from './buffer/query_buffer'
export { MODES, toggleMode, type Mode } from './session/mode'
export { QUIT_KEY, pressed, type KeyEvent, type KeyPhase, type KeyPress } from './session/keys'
export { ExploreSession, type ExploreSessionOptions } from './session/session'
export { POLL_INTERVAL_MS, SessionLoop, type SessionLoopOptions } from './session/loop'
export {
    DATASET_FORMATS,
    GraphEngineError,
    type DatasetFormat,
    type GraphEngine,
    type QueryOutcome,
    type SolutionRow,
} from './graph/engine'
export { OxigraphEngine } from './graph/oxigraph_engine'
export { formatTerm, parseSparqlJsonResults, type RdfTermJson } from './graph/sparql_results'
export { EMPTY_VIEW, runQuery, type QueryView } from './graph/bridge'
export {
    DatasetLoadError,
    loadDataset,
    resolveDatasetSource,
    type DatasetSource,
    type LoadedDataset,
} from './dataset/load_dataset'
export {
    COLUMN_SPACING,
    NO_RESULT,
    PANE_TITLES,
    centerLine,
    clipToWidth,
    composeFrame,
    fitToWidth,
    layoutTable,
    splitWidth,
    type ExploreContent,
    type ExplorePaneModel,
    type FrameInput,
    type FrameModel,
    type FrameSize,
    type PaneModel,
    type QueryPaneModel,
    type TableLayout,
} from './render/compose'
