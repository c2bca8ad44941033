#!/usr/bin/env node
/**
 * CLI entry point for gitenv.
 *
 * Parses arguments with meow, loads settings, starts the logger and renders
 * the menu. Unknown arguments are ignored so any invocation lands in the
 * menu, except `--version` and `--init`, which print and exit. Without
 * `--init` a missing settings.yml just means defaults.
 *
 * @example
 * ```bash
 * gitenv                  # Open the menu
 * gitenv --version        # Print the version
 * gitenv --init           # Write ~/.gitenv/settings.yml with defaults
 * gitenv --init --force   # Overwrite it
 * ```
 */
import meow from 'meow'
import { render } from 'ink'
import { attempt } from '@logosdx/utils'

import { App } from './app.js'
import {
    SettingsManager,
    createEnvContext,
    getLogger,
    startLogger,
    stopLogger,
} from '../core/index.js'


/**
 * Parse CLI arguments. `--version` is answered by meow itself.
 */
function parseCli() {

    return meow({
        importMeta: import.meta,
        autoHelp: false,
        flags: {
            init: {
                type: 'boolean',
                default: false
            },
            force: {
                type: 'boolean',
                shortFlag: 'f',
                default: false
            }
        }
    })
}


/**
 * Write the default settings file and report where it went.
 */
async function initSettings(manager: SettingsManager, force: boolean): Promise<number> {

    const [, err] = await attempt(() => manager.init(force))

    if (err) {

        console.error(`gitenv: ${err.message}`)
        return 1
    }

    console.log(`Wrote ${manager.settingsFilePath}`)
    return 0
}


/**
 * Main entry point.
 */
async function main(): Promise<void> {

    const cli = parseCli()
    const manager = new SettingsManager()

    if (cli.flags.init) {

        process.exit(await initSettings(manager, cli.flags.force))
    }

    const [, loadErr] = await attempt(() => manager.load())

    if (loadErr) {

        console.error(`gitenv: ${loadErr.message}`)
        process.exit(1)
    }

    const logger = await startLogger(manager.settings, manager.paths)

    logger?.setContext({ version: cli.pkg.version ?? 'unknown' })

    if (!process.stdin.isTTY) {

        logger?.warn('stdin is not a terminal, the menu cannot read keys')
    }

    const ctx = createEnvContext(manager.settings, manager.paths)

    // Ctrl+C goes through GlobalKeyboard so the log is flushed first
    const { waitUntilExit } = render(
        <App ctx={ctx} settingsFile={manager.settingsFilePath} />,
        {
            exitOnCtrlC: false,
            patchConsole: true
        }
    )

    await waitUntilExit()
    await stopLogger()
}


main().catch(async (error: unknown) => {

    console.error('Fatal error:', error)

    getLogger()?.error('Fatal error', { error: error instanceof Error ? error.message : String(error) })
    await stopLogger()

    process.exit(1)
})
