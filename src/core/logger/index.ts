/**
 * Logger Module
 *
 * Captures observer events and streams them to the log file.
 *
 * Features:
 * - Level filtering by event name
 * - JSON lines on file, compact lines on stderr in CI
 * - Size-based rotation with numbered backups
 */

// Types
export type {
    LogLevel,
    EntryLevel,
    LogEntry,
    LoggerConfig,
    RotationResult,
    LoggerState,
} from './types.js';

export { LOG_LEVEL_PRIORITY } from './types.js';

// Classifier
export { classifyEvent, shouldLog, entryAllowed } from './classifier.js';

// Formatter
export { generateMessage, formatEntry, formatLine, serializeEntry } from './formatter.js';

// Color
export { formatColorLine } from './color.js';

// Rotation
export {
    parseSize,
    backupName,
    listBackups,
    needsRotation,
    checkAndRotate,
} from './rotation.js';

// Logger
export { Logger, type LoggerOptions } from './logger.js';

// Initialization
export { startLogger, stopLogger, getLogger, type StartLoggerOptions } from './init.js';
