/**
 * Logger
 *
 * Subscribes to every observer event and writes the ones that pass the
 * configured level: JSON lines to the file stream, compact lines to the
 * console stream.
 *
 * @example
 * ```typescript
 * import { createWriteStream } from 'node:fs'
 *
 * const logger = new Logger({
 *     config: settings.logging,
 *     file: createWriteStream(paths.logFile, { flags: 'a' }),
 * })
 *
 * logger.start()
 * ```
 */
import type { Writable } from 'node:stream';

import { observer } from '../observer.js';
import { entryAllowed, shouldLog } from './classifier.js';
import { formatEntry, formatLine, serializeEntry } from './formatter.js';
import { formatColorLine } from './color.js';
import type { EntryLevel, LogEntry, LogLevel, LoggerConfig, LoggerState } from './types.js';

/**
 * Options for Logger construction.
 */
export interface LoggerOptions {
    /** Logging settings */
    config: LoggerConfig;

    /** Context to include with every entry */
    context?: Record<string, unknown>;

    /** JSON-lines destination */
    file?: Writable;

    /** Compact-lines destination */
    console?: Writable;

    /** Color the compact lines */
    color?: boolean;
}

/**
 * Turn an arbitrary event payload into a plain record.
 */
function toRecord(value: unknown): Record<string, unknown> {

    if (value === undefined) return {};

    if (value === null || typeof value !== 'object') return { value };

    return Object.fromEntries(Object.entries(value));

}

/**
 * Logger that captures observer events and writes to streams.
 */
export class Logger {

    #config: LoggerConfig;
    #context: Record<string, unknown>;
    #file: Writable | null;
    #console: Writable | null;
    #color: boolean;
    #state: LoggerState = 'idle';
    #cleanup: Array<() => void> = [];

    constructor(options: LoggerOptions) {

        this.#config = options.config;
        this.#context = options.context ?? {};
        this.#file = options.file ?? null;
        this.#console = options.console ?? null;
        this.#color = options.color ?? false;

    }

    get state(): LoggerState {

        return this.#state;

    }

    get level(): LogLevel {

        return this.#config.level;

    }

    /**
     * Check if logging is enabled.
     */
    get isEnabled(): boolean {

        return this.#config.enabled && this.#config.level !== 'silent';

    }

    /**
     * Merge into the context included with every entry.
     */
    setContext(context: Record<string, unknown>): void {

        this.#context = { ...this.#context, ...context };

    }

    /**
     * Begin capturing observer events. No-op when disabled or started.
     */
    start(): void {

        if (this.#state !== 'idle' || !this.isEnabled) {

            return;

        }

        this.#cleanup.push(
            observer.on(/./, ({ event, data }) => {

                this.#handleEvent(String(event), toRecord(data));

            }),
        );

        this.#state = 'running';

        observer.emit('logger:started', {
            file: this.#config.file,
            level: this.#config.level,
        });

    }

    /**
     * Stop capturing and close the file stream. Call from the shutdown path.
     */
    async stop(): Promise<void> {

        if (this.#state !== 'running') {

            return;

        }

        this.#state = 'flushing';

        for (const cleanup of this.#cleanup) cleanup();

        this.#cleanup = [];

        const file = this.#file;

        if (file && file !== process.stdout && file !== process.stderr) {

            await new Promise<void>((resolve) => {

                file.end(() => resolve());

            });

        }

        this.#state = 'stopped';

    }

    /**
     * Handle an observer event.
     */
    #handleEvent(event: string, data: Record<string, unknown>): void {

        if (!shouldLog(event, this.#config.level)) {

            return;

        }

        this.#write(event, data);

    }

    #write(event: string, data: Record<string, unknown>): void {

        const includeData = this.#config.level === 'verbose';

        this.#output(formatEntry(event, data, this.#context, includeData));

    }

    #output(entry: LogEntry): void {

        this.#file?.write(serializeEntry(entry));
        this.#console?.write(this.#color ? formatColorLine(entry) : formatLine(entry));

    }

    // Entries written directly rather than through an event, under event `log`

    info(message: string, data?: Record<string, unknown>): void {

        this.#log('info', message, data);

    }

    warn(message: string, data?: Record<string, unknown>): void {

        this.#log('warn', message, data);

    }

    error(message: string, data?: Record<string, unknown>): void {

        this.#log('error', message, data);

    }

    #log(level: EntryLevel, message: string, data?: Record<string, unknown>): void {

        if (this.#state !== 'running' || !entryAllowed(level, this.#config.level)) {

            return;

        }

        const entry: LogEntry = {
            timestamp: new Date().toISOString(),
            level,
            event: 'log',
            message,
        };

        if (data && this.#config.level === 'verbose') entry.data = data;
        if (Object.keys(this.#context).length > 0) entry.context = this.#context;

        this.#output(entry);

    }

}
