/**
 * Panel - rounded box with an optional title and a dimmed footer line.
 *
 * `tone` colors the border and the title: menus and forms are `info`,
 * finished operations `success` or `warning`, failures `danger`.
 *
 * @example
 * ```tsx
 * <Panel title="work" tone="success" footer="Press any key to return to the menu">
 *     <Text>SSH authenticated</Text>
 * </Panel>
 * ```
 */
import { Box, Text } from 'ink'

import type { ReactNode, ReactElement } from 'react'


export type PanelTone = 'info' | 'success' | 'warning' | 'danger'


const TONES: Record<PanelTone, { border: string; title: string }> = {
    info: { border: 'gray', title: 'cyan' },
    success: { border: 'green', title: 'green' },
    warning: { border: 'yellow', title: 'yellow' },
    danger: { border: 'red', title: 'red' },
}


export interface PanelProps {

    title?: string

    tone?: PanelTone

    /** Key hint under the content */
    footer?: string

    /** Dialog spacing inside the border */
    roomy?: boolean

    children: ReactNode
}


export function Panel({ title, tone = 'info', footer, roomy = false, children }: PanelProps): ReactElement {

    const colors = TONES[tone]

    return (
        <Box
            flexDirection="column"
            borderStyle="round"
            borderColor={colors.border}
            paddingX={roomy ? 2 : 1}
            paddingY={roomy ? 1 : 0}
        >
            {title !== undefined && (
                <Box marginBottom={1}>
                    <Text bold color={colors.title}>{title}</Text>
                </Box>
            )}

            {children}

            {footer !== undefined && (
                <Box marginTop={1}>
                    <Text dimColor>{footer}</Text>
                </Box>
            )}
        </Box>
    )
}
