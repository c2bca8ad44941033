/**
 * Event Classifier
 *
 * Classifies observer events by log level based on naming patterns.
 *
 * Classification rules:
 * - 'error', '*:failed' -> error
 * - '*:warning', '*:aborted' -> warn
 * - lifecycle verbs ('*:start', '*:complete', '*:removed', ...) -> info
 * - Everything else -> debug
 */
import type { EntryLevel, LogLevel } from './types.js';
import { LOG_LEVEL_PRIORITY } from './types.js';

const LEVEL_PATTERNS: Array<[EntryLevel, RegExp[]]> = [
    ['error', [/^error$/, /:error$/, /:failed$/]],
    ['warn', [/:warning$/, /:aborted$/]],
    ['info', [
        /:start$/,
        /:started$/,
        /:complete$/,
        /:loaded$/,
        /:initialized$/,
        /:removed$/,
        /:upserted$/,
        /:rotated$/,
        /:shutdown$/,
    ]],
];

const ENTRY_PRIORITY: Record<EntryLevel, number> = {
    error: 1,
    warn: 2,
    info: 3,
    debug: 4,
};

/**
 * Classify an event name to determine its log level.
 *
 * @example
 * ```typescript
 * classifyEvent('error')          // 'error'
 * classifyEvent('env:failed')     // 'error'
 * classifyEvent('env:complete')   // 'info'
 * classifyEvent('env:step')       // 'debug'
 * ```
 */
export function classifyEvent(event: string): EntryLevel {

    for (const [level, patterns] of LEVEL_PATTERNS) {

        if (patterns.some((pattern) => pattern.test(event))) {

            return level;

        }

    }

    return 'debug';

}

/**
 * Check if an event should be logged at the given verbosity level.
 *
 * @example
 * ```typescript
 * shouldLog('error', 'warn')           // true
 * shouldLog('env:complete', 'info')    // true
 * shouldLog('env:step', 'info')        // false
 * shouldLog('env:step', 'verbose')     // true
 * ```
 */
export function shouldLog(event: string, configLevel: LogLevel): boolean {

    return entryAllowed(classifyEvent(event), configLevel);

}

/**
 * Whether an entry of `level` passes the configured level.
 */
export function entryAllowed(level: EntryLevel, configLevel: LogLevel): boolean {

    if (configLevel === 'silent') return false;
    if (configLevel === 'verbose') return true;

    return ENTRY_PRIORITY[level] <= LOG_LEVEL_PRIORITY[configLevel];

}
