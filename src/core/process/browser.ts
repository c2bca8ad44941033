/**
 * Opening a URL in the user's browser. Best-effort: the caller prints the
 * URL when this returns false.
 */
import { attempt } from '@logosdx/utils'

import type { CommandRunner } from './runner.js'


export interface BrowserLauncher {

    open(url: string): Promise<boolean>
}


function openCommand(platform: NodeJS.Platform, url: string): [string, string[]] {

    if (platform === 'darwin') return ['open', [url]]
    if (platform === 'win32') return ['cmd', ['/c', 'start', '""', url]]

    return ['xdg-open', [url]]
}


export class SystemBrowser implements BrowserLauncher {

    readonly #runner: CommandRunner
    readonly #platform: NodeJS.Platform

    constructor(
        runner: CommandRunner,
        platform: NodeJS.Platform = process.platform,
    ) {

        this.#runner = runner
        this.#platform = platform
    }

    async open(url: string): Promise<boolean> {

        const [command, args] = openCommand(this.#platform, url)
        const [result] = await attempt(() => this.#runner.run(command, args, { timeoutMs: 10_000 }))

        return result?.code === 0
    }
}
