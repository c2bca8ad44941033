/**
 * Logger Initialization
 *
 * Starts the process-wide logger once settings are known: rotates the log
 * file if it has grown past `logging.maxSize`, opens it for appending and
 * subscribes to the observer. In CI or without a TTY, compact lines are
 * mirrored to stderr so they never mix with the TUI on stdout, colored when
 * stderr is a terminal.
 *
 * @example
 * ```typescript
 * // In CLI entry point (src/cli/index.tsx)
 * await manager.load()
 * await startLogger(manager.settings, manager.paths)
 * // ...
 * await stopLogger()
 * ```
 */
import { createWriteStream } from 'node:fs';
import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { Writable } from 'node:stream';

import { attempt } from '@logosdx/utils';

import { observer } from '../observer.js';
import { isCi } from '../environment.js';
import { Logger } from './logger.js';
import { checkAndRotate } from './rotation.js';
import type { Settings, WorkspacePaths } from '../settings/types.js';

let active: Logger | null = null;

/**
 * Options for startLogger.
 */
export interface StartLoggerOptions {

    /** Override the compact-lines stream (default: stderr in CI, none otherwise) */
    console?: Writable;

}

/**
 * Start the logger. Returns the running logger, or null when logging is
 * disabled or the log directory cannot be created.
 *
 * Calling again while a logger is running returns that logger.
 */
export async function startLogger(
    settings: Settings,
    paths: WorkspacePaths,
    options: StartLoggerOptions = {},
): Promise<Logger | null> {

    if (active) {

        return active;

    }

    const config = { ...settings.logging, file: paths.logFile };

    if (!config.enabled || config.level === 'silent') {

        return null;

    }

    const [, mkdirErr] = await attempt(() => mkdir(dirname(paths.logFile), { recursive: true }));

    if (mkdirErr) {

        observer.emit('error', { source: 'logger', error: mkdirErr, context: { file: paths.logFile } });

        return null;

    }

    const [rotation, rotateErr] = await attempt(() =>
        checkAndRotate(paths.logFile, config.maxSize, config.maxFiles),
    );

    const mirror = options.console ?? (isCi() ? process.stderr : undefined);

    active = new Logger({
        config,
        file: createWriteStream(paths.logFile, { flags: 'a' }),
        console: mirror,
        color: mirror === process.stderr && process.stderr.isTTY === true,
        context: { pid: process.pid },
    });

    active.start();

    if (rotateErr) {

        observer.emit('error', { source: 'logger', error: rotateErr, context: { file: paths.logFile } });

    }
    else if (rotation.rotated) {

        observer.emit('logger:rotated', { oldFile: paths.logFile, newFile: rotation.newFile });

    }

    return active;

}

/**
 * Stop the running logger, flushing its file.
 */
export async function stopLogger(): Promise<void> {

    if (!active) {

        return;

    }

    const logger = active;

    active = null;
    await logger.stop();

}

/**
 * The running logger, if any.
 */
export function getLogger(): Logger | null {

    return active;

}
