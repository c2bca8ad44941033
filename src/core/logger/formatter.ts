/**
 * Turns observer events into log entries, and entries into text.
 */
import { attemptSync } from '@logosdx/utils'

import type { LogEntry } from './types.js'
import { classifyEvent } from './classifier.js'


type Template = (data: Record<string, unknown>) => string


function errorMessage(value: unknown): string {

    return value instanceof Error ? value.message : String(value)
}


function verdict(value: unknown, yes: string, no: string): string {

    if (value === null || value === undefined) return 'not checked'

    return value ? yes : no
}


/**
 * Human-readable message templates, keyed by event name.
 */
const MESSAGE_TEMPLATES: Record<string, Template> = {

    // Settings
    'settings:loaded': (d) => d['fromFile']
        ? `Settings loaded from ${d['path']}`
        : `No settings at ${d['path']}, using defaults`,
    'settings:initialized': (d) => `Settings initialized at ${d['path']}`,

    // Add environment
    'env:start': (d) => `Adding environment ${d['id']} (${d['sshHost']})`,
    'env:step': (d) => `${d['id']}: ${d['step']} ${d['status']}${d['detail'] ? ` (${d['detail']})` : ''}`,
    'env:warning': (d) => `${d['id']}: ${d['step']}: ${d['message']}`,
    'env:aborted': (d) => `Environment ${d['id']} aborted: ${d['reason']}`,
    'env:failed': (d) => `Environment ${d['id']} failed at ${d['step']}: ${d['error']}`,
    'env:complete': (d) => d['status'] === 'verified'
        ? `Environment ${d['id']} verified (ssh ${verdict(d['sshOk'], 'ok', 'failed')}, git ${verdict(d['gitMatches'], 'match', 'mismatch')})`
        : `Environment ${d['id']} configured but not verified`,

    // Reset
    'reset:removed': (d) => `Removed ${d['path']}`,
    'reset:complete': (d) => `Reset ${d['scope']}: ${d['count']} file(s) removed`,

    // Store
    'store:upserted': (d) => `Wrote configuration for ${d['id']}${d['replacedStanza'] ? ' (stanza replaced)' : ''}`,
    'store:removed': (d) => `Removed previous files of ${d['id']}`,

    // Verification
    'probe:complete': (d) => `SSH probe ${d['host']}: ${d['ok'] ? 'authenticated' : 'failed'} (${d['detail']})`,
    'verify:complete': (d) => `Git identity in ${d['directory']}: ${d['name']} <${d['email']}>`,
    'list:complete': (d) => `Listed ${d['count']} environment(s)`,

    // Registration gate
    'gate:changed': (d) => `Registration gate for ${d['id']}: ${d['state']} (${d['prompts']} re-prompt(s))`,

    // App lifecycle
    'app:shutdown': (d) => `Shutting down (${d['reason']})`,

    // Logger lifecycle
    'logger:started': (d) => `Logger started: ${d['file']} at ${d['level']} level`,
    'logger:rotated': (d) => `Rotated log: ${d['oldFile']} -> ${d['newFile']}`,

    // Generic error
    'error': (d) => `Error in ${d['source']}: ${errorMessage(d['error'])}`,
}


/**
 * Message for an event: its template, or `event words: key=value, ...`
 * over the first three fields when there is none or the template throws.
 *
 * @example
 * ```typescript
 * generateMessage('reset:complete', { scope: 'ssh', count: 3 })
 * // 'Reset ssh: 3 file(s) removed'
 *
 * generateMessage('custom:thing', { a: 1 })
 * // 'custom thing: a=1'
 * ```
 */
export function generateMessage(event: string, data: Record<string, unknown>): string {

    const template = MESSAGE_TEMPLATES[event]

    if (template) {

        const [message, err] = attemptSync(() => template(data))

        if (!err) return message
    }

    const words = event.split(':').join(' ')
    const fields = Object.entries(data).slice(0, 3).map(([key, value]) => `${key}=${preview(value)}`)

    return fields.length ? `${words}: ${fields.join(', ')}` : words
}


const PREVIEW_LIMIT = 50


function preview(value: unknown): string {

    if (typeof value === 'string') {

        const text = value.length > PREVIEW_LIMIT ? `${value.slice(0, PREVIEW_LIMIT - 3)}...` : value

        return `"${text}"`
    }

    if (Array.isArray(value)) return `[${value.length} items]`
    if (value !== null && typeof value === 'object') return `{${Object.keys(value).length} keys}`

    return String(value)
}


function toJsonSafe(value: unknown): unknown {

    if (value instanceof Error) {

        // Three stack lines are enough to find the throw site
        return { name: value.name, message: value.message, stack: value.stack?.split('\n', 3).join('\n') }
    }

    if (value instanceof Date) return value.toISOString()

    const [, err] = attemptSync(() => JSON.stringify(value))

    return err ? String(value) : value
}


/**
 * Format an event into a LogEntry.
 *
 * @example
 * ```typescript
 * const entry = formatEntry('list:complete', { count: 2 }, { pid: 42 }, true)
 * // {
 * //     timestamp: '2026-01-15T10:30:00.000Z',
 * //     level: 'info',
 * //     event: 'list:complete',
 * //     message: 'Listed 2 environment(s)',
 * //     data: { count: 2 },
 * //     context: { pid: 42 }
 * // }
 * ```
 */
export function formatEntry(
    event: string,
    data: Record<string, unknown>,
    context?: Record<string, unknown>,
    includeData = false,
): LogEntry {

    const entry: LogEntry = {
        timestamp: new Date().toISOString(),
        level: classifyEvent(event),
        event,
        message: generateMessage(event, data),
    }

    if (includeData && Object.keys(data).length > 0) {

        entry.data = Object.fromEntries(Object.entries(data).map(([key, value]) => [key, toJsonSafe(value)]))
    }

    if (context && Object.keys(context).length > 0) {

        entry.context = context
    }

    return entry
}


/**
 * Compact single-line form used when logging to stdout.
 *
 * @example
 * ```typescript
 * formatLine(entry)
 * // '[2026-01-15T10:30:00.000Z] [INFO ] [list:complete] Listed 2 environment(s)\n'
 * ```
 */
export function formatLine(entry: LogEntry): string {

    const levelLabel = entry.level.toUpperCase().padEnd(5)
    const data = entry.data ? ` ${JSON.stringify(entry.data)}` : ''

    return `[${entry.timestamp}] [${levelLabel}] [${entry.event}] ${entry.message}${data}\n`
}


/** One JSON line, the log file format */
export function serializeEntry(entry: LogEntry): string {

    return JSON.stringify(entry) + '\n'
}
