/**
 * Central event system for gitenv.
 *
 * Core modules emit events, the TUI and the logger subscribe. Core code never
 * prints; everything the user sees about an operation's progress flows
 * through here.
 *
 * @example
 * ```typescript
 * // In core module - emit events at key points
 * observer.emit('env:step', { id: 'work', step: 'keygen', status: 'done' })
 *
 * // In CLI - subscribe to events
 * const cleanup = observer.on('env:step', (data) => updateProgress(data))
 *
 * // Pattern matching for multiple events
 * observer.on(/^reset:/, ({ event, data }) => logReset(event, data))
 * ```
 */
import {
    ObserverEngine,
    type Events
} from '@logosdx/observer'

import { isDebug } from './environment.js'


/**
 * Steps of the add-environment workflow, in execution order.
 */
export type EnvStep =
    | 'layout'
    | 'collision'
    | 'keygen'
    | 'permissions'
    | 'agent'
    | 'ssh-config'
    | 'git-config'
    | 'publish'
    | 'registration'
    | 'verify-ssh'
    | 'verify-git'


/**
 * All events emitted by gitenv core modules.
 *
 * Events are namespaced by module:
 * - `settings:*` - Settings load/init
 * - `env:*` - Add-environment workflow
 * - `reset:*` - Blanket SSH/Git resets
 * - `store:*` - Identity store writes
 * - `probe:*` / `verify:*` - Connectivity and Git identity checks
 * - `list:*` - List & verify
 * - `gate:*` - Registration confirmation gate
 * - `error` - Catch-all errors
 */
export interface GitenvEvents {

    // Settings
    'settings:loaded': { path: string; fromFile: boolean }
    'settings:initialized': { path: string }

    // Add environment
    'env:start': { id: string; sshHost: string }
    'env:step': { id: string; step: EnvStep; status: 'running' | 'done' | 'skipped' | 'failed'; detail?: string }
    'env:warning': { id: string; step: EnvStep; message: string }
    'env:aborted': { id: string; reason: string }
    'env:failed': { id: string; step: EnvStep; error: string }
    'env:complete': { id: string; status: 'verified' | 'unverified'; sshOk: boolean | null; gitMatches: boolean | null }

    // Reset
    'reset:removed': { scope: 'ssh' | 'git'; path: string }
    'reset:complete': { scope: 'ssh' | 'git'; count: number }

    // Store
    'store:upserted': { id: string; replacedStanza: boolean; addedInclude: boolean }
    'store:removed': { id: string; paths: string[] }

    // Verification
    'probe:complete': { host: string; ok: boolean; detail: string }
    'verify:complete': { directory: string; name: string; email: string }

    // Listing
    'list:complete': { count: number }

    // Registration gate
    'gate:changed': { id: string; state: 'waiting' | 'confirmed' | 'cancelled' | 'timed-out'; prompts: number }

    // App lifecycle
    'app:shutdown': { reason: string }

    // Logger lifecycle
    'logger:started': { file: string; level: string }
    'logger:rotated': { oldFile: string; newFile: string }

    // Errors
    'error': { source: string; error: Error; context?: Record<string, unknown> }
}

export type GitenvEventNames = Events<GitenvEvents>;

/**
 * Global observer instance for gitenv.
 *
 * Enable debug mode with `GITENV_DEBUG=1` to see all events as they occur.
 */
export const observer = new ObserverEngine<GitenvEvents>({
    name: 'gitenv',
    spy: isDebug()
        ? (action) => console.error(`[gitenv:${action.fn}] ${String(action.event)}`)
        : undefined
});

export type { ObserverEngine }
