import { Text } from 'ink'
import type { ExplorePaneModel } from '@rdf-explorer/core'
import { PaneFrame } from './PaneFrame'

type ExplorePaneProps = {
    pane: ExplorePaneModel
}

export function ExplorePane({ pane }: ExplorePaneProps) {
    const { content } = pane

    return (
        <PaneFrame
            title={pane.title}
            width={pane.width}
            height={pane.height}
            highlighted={pane.highlighted}
            paddingX={pane.paddingX}
        >
            {content.kind === 'empty' ? (
                <Text wrap="truncate">{content.line}</Text>
            ) : (
                <>
                    <Text bold underline wrap="truncate">
                        {content.header}
                    </Text>
                    {content.rows.map((row, index) => (
                        <Text key={index} wrap="truncate">
                            {row}
                        </Text>
                    ))}
                </>
            )}
        </PaneFrame>
    )
}
