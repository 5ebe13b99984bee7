import type { ReactNode } from 'react'
import { Box, Text } from 'ink'
import stringWidth from 'string-width'
import { clipToWidth } from '@rdf-explorer/core'
import { BOX_CHARS, paneColor } from '../constants'

export type TopBorder = {
    left: string
    title: string
    fill: string
    right: string
}

/** `┌Title────┐`, clipped to `width` cells. */
export function buildTopBorder(width: number, title: string): TopBorder {
    if (width <= 0) return { left: '', title: '', fill: '', right: '' }
    if (width === 1) return { left: BOX_CHARS.TOP_LEFT, title: '', fill: '', right: '' }

    const inner = width - 2
    const clipped = clipToWidth(title, inner)
    return {
        left: BOX_CHARS.TOP_LEFT,
        title: clipped,
        fill: BOX_CHARS.HORIZONTAL.repeat(inner - stringWidth(clipped)),
        right: BOX_CHARS.TOP_RIGHT,
    }
}

type PaneFrameProps = {
    title: string
    width: number
    height: number
    highlighted: boolean
    paddingX?: number
    children?: ReactNode
}

/** Single-line bordered box with its title set into the top border. */
export function PaneFrame({
    title,
    width,
    height,
    highlighted,
    paddingX = 0,
    children,
}: PaneFrameProps) {
    if (height <= 0 || width <= 0) return null

    const color = paneColor(highlighted)
    const top = buildTopBorder(width, title)

    return (
        <Box flexDirection="column" width={width} height={height} flexShrink={0}>
            <Text color={color}>
                {top.left}
                <Text bold>{top.title}</Text>
                {top.fill}
                {top.right}
            </Text>
            {height > 1 ? (
                <Box
                    flexDirection="column"
                    borderStyle="single"
                    borderTop={false}
                    borderColor={color}
                    width={width}
                    height={height - 1}
                    paddingX={paddingX}
                    overflow="hidden"
                >
                    {children}
                </Box>
            ) : null}
        </Box>
    )
}
