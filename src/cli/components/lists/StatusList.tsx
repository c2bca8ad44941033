/**
 * StatusList - one line per check or step: icon, label, dimmed detail.
 *
 * The add screen feeds it workflow steps as observer events arrive; the
 * list screen feeds it the checks of one environment.
 *
 * @example
 * ```tsx
 * <StatusList
 *     items={[
 *         { label: 'Generate SSH key', status: 'success', detail: '~/.ssh/id_ed25519_work' },
 *         { label: 'Add key to ssh-agent', status: 'warning', detail: 'agent not running' },
 *         { label: 'Write SSH config', status: 'running' },
 *     ]}
 * />
 * ```
 */
import { Box, Text } from 'ink'

import type { ReactElement } from 'react'


export type StatusType = 'pending' | 'running' | 'success' | 'error' | 'warning' | 'skipped'


export interface StatusListItem {

    /** React key; defaults to the label */
    key?: string

    label: string

    status: StatusType

    detail?: string
}


export interface StatusListProps {

    items: StatusListItem[]
}


const ICONS: Record<StatusType, [icon: string, color: string]> = {
    pending: ['○', 'gray'],
    running: ['●', 'blue'],
    success: ['✓', 'green'],
    error: ['✗', 'red'],
    warning: ['⚠', 'yellow'],
    skipped: ['−', 'gray'],
}


function StatusLine({ label, status, detail }: Omit<StatusListItem, 'key'>): ReactElement {

    const [icon, color] = ICONS[status]

    return (
        <Box gap={1}>
            <Text color={color}>{icon}</Text>
            <Text dimColor={status === 'pending' || status === 'skipped'}>{label}</Text>
            {detail !== undefined && detail !== '' && <Text dimColor>({detail})</Text>}
        </Box>
    )
}


export function StatusList({ items }: StatusListProps): ReactElement {

    return (
        <Box flexDirection="column">
            {items.map((item) => (
                <StatusLine key={item.key ?? item.label} label={item.label} status={item.status} detail={item.detail} />
            ))}
        </Box>
    )
}
