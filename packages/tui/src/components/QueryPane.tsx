import { Text } from 'ink'
import type { QueryPaneModel } from '@rdf-explorer/core'
import { PaneFrame } from './PaneFrame'

type QueryPaneProps = {
    pane: QueryPaneModel
}

export function QueryPane({ pane }: QueryPaneProps) {
    return (
        <PaneFrame
            title={pane.title}
            width={pane.width}
            height={pane.height}
            highlighted={pane.highlighted}
        >
            {pane.lines.map((line, index) => (
                <Text key={index} wrap="truncate">
                    {line}
                </Text>
            ))}
        </PaneFrame>
    )
}
