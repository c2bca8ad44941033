/**
 * Logger types.
 */
import type { LoggingSettings } from '../settings/types.js';

/** Configured verbosity (`logging.level`) */
export type LogLevel = LoggingSettings['level'];

/** Severity stamped on each written entry */
export type EntryLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * How much each configured level lets through; an entry is written when
 * its own rank is at most this.
 */
export const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
    silent: 0,
    error: 1,
    warn: 2,
    info: 3,
    verbose: 4,
};

/**
 * One line of the log file.
 *
 * @example
 * ```json
 * {"timestamp":"2026-01-15T10:30:00.000Z","level":"info","event":"env:complete","message":"Environment pepsi verified (ssh ok, git match)"}
 * ```
 */
export interface LogEntry {
    /** ISO 8601 */
    timestamp: string;
    level: EntryLevel;
    event: string;
    message: string;

    /** Event payload, written at the verbose level only */
    data?: Record<string, unknown>;

    /** Fields stamped on every entry, such as the pid */
    context?: Record<string, unknown>;
}

/** `logging` settings with `file` already resolved */
export type LoggerConfig = LoggingSettings;

export type RotationResult =
    | { rotated: false }
    | {
        rotated: true;
        oldFile: string;

        /** Backup the log was moved to */
        newFile: string;

        /** Backups dropped past `maxFiles` */
        deletedFiles: string[];
    };

export type LoggerState = 'idle' | 'running' | 'flushing' | 'stopped';
