/**
 * Color Formatter
 *
 * ANSI-colored variant of the compact console line, for a console stream
 * that is a terminal.
 */
import ansis from 'ansis';
import dayjs from 'dayjs';

import type { EntryLevel, LogEntry } from './types.js';

const LEVEL_STYLE: Record<EntryLevel, { icon: string; color: (s: string) => string }> = {
    error: { icon: '✖', color: (s) => ansis.red(s) },
    warn: { icon: '⚠', color: (s) => ansis.yellow(s) },
    info: { icon: '●', color: (s) => ansis.cyan(s) },
    debug: { icon: '·', color: (s) => ansis.gray(s) },
};

/**
 * Colored single-line form: local wall-clock time, level icon, event, message.
 * The entry itself keeps its UTC timestamp.
 *
 * @example
 * ```typescript
 * formatColorLine(entry)
 * // '10:30:00 ● list:complete Listed 2 environment(s)\n' (with colors)
 * ```
 */
export function formatColorLine(entry: LogEntry): string {

    const style = LEVEL_STYLE[entry.level];
    const time = dayjs(entry.timestamp).format('HH:mm:ss');
    const data = entry.data ? ` ${ansis.dim(JSON.stringify(entry.data))}` : '';

    return `${ansis.dim(time)} ${style.color(style.icon)} ${ansis.bold(entry.event)} ${entry.message}${data}\n`;

}
