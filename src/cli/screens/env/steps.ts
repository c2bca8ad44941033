/**
 * Progress rows for the add-environment screen.
 *
 * Pure reducers over `env:step` and `env:warning` payloads so the screen
 * only stores the resulting list.
 */
import type { EnvStep, GitenvEvents } from '../../../core/index.js'
import type { StatusListItem, StatusType } from '../../components/index.js'


export const STEP_ORDER: EnvStep[] = [
    'layout',
    'collision',
    'keygen',
    'permissions',
    'agent',
    'ssh-config',
    'git-config',
    'publish',
    'registration',
    'verify-ssh',
    'verify-git',
]


export const STEP_LABELS: Record<EnvStep, string> = {
    'layout': 'Prepare directories',
    'collision': 'Check for an existing identity',
    'keygen': 'Generate SSH key',
    'permissions': 'Restrict key permissions',
    'agent': 'Add key to ssh-agent',
    'ssh-config': 'Write SSH config',
    'git-config': 'Write Git config',
    'publish': 'Publish public key',
    'registration': 'Wait for key registration',
    'verify-ssh': 'Verify SSH',
    'verify-git': 'Verify Git identity',
}


const STATUS_MAP: Record<GitenvEvents['env:step']['status'], StatusType> = {
    running: 'running',
    done: 'success',
    skipped: 'skipped',
    failed: 'error',
}


/**
 * Every step, pending.
 */
export function initialSteps(): StatusListItem[] {

    return STEP_ORDER.map<StatusListItem>((step) => ({ key: step, label: STEP_LABELS[step], status: 'pending' }))
}


/**
 * Apply one `env:step` event. A step already marked as a warning keeps that
 * status when it later reports done.
 */
export function applyStepEvent(items: StatusListItem[], event: GitenvEvents['env:step']): StatusListItem[] {

    return items.map<StatusListItem>((item) => {

        if (item.key !== event.step) return item

        const status = STATUS_MAP[event.status]

        if (item.status === 'warning' && status === 'success') return item

        return { ...item, status, detail: event.detail ?? item.detail }
    })
}


/**
 * Apply one `env:warning` event.
 */
export function applyWarningEvent(items: StatusListItem[], event: GitenvEvents['env:warning']): StatusListItem[] {

    return items.map<StatusListItem>((item) =>
        item.key === event.step ? { ...item, status: 'warning', detail: event.message } : item
    )
}
