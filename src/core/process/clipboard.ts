/**
 * Platform-agnostic clipboard.
 *
 * Uses native OS commands:
 * - macOS: pbcopy
 * - Linux: xclip, then xsel, then wl-copy
 * - Windows: clip
 */
import { attempt } from '@logosdx/utils'

import type { CommandRunner } from './runner.js'


/**
 * Best-effort clipboard access.
 */
export interface Clipboard {

    /**
     * @returns false when no clipboard utility worked
     */
    copy(text: string): Promise<boolean>
}


type Candidate = [command: string, args: string[]]

const CANDIDATES: Partial<Record<NodeJS.Platform, Candidate[]>> = {
    darwin: [['pbcopy', []]],
    linux: [
        ['xclip', ['-selection', 'clipboard']],
        ['xsel', ['--clipboard', '--input']],
        ['wl-copy', []],
    ],
    win32: [['clip', []]],
}


/**
 * Clipboard that pipes text into the platform's copy utility.
 */
export class SystemClipboard implements Clipboard {

    readonly #runner: CommandRunner
    readonly #platform: NodeJS.Platform

    constructor(
        runner: CommandRunner,
        platform: NodeJS.Platform = process.platform,
    ) {

        this.#runner = runner
        this.#platform = platform
    }

    async copy(text: string): Promise<boolean> {

        for (const [command, args] of CANDIDATES[this.#platform] ?? []) {

            const [result] = await attempt(() =>
                this.#runner.run(command, args, { input: text, timeoutMs: 5000 })
            )

            if (result?.code === 0) return true
        }

        return false
    }
}
