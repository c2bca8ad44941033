/**
 * SSH connectivity probe.
 *
 * Git hosts refuse shell access, so `ssh -T` always exits non-zero. Success
 * is recognised by the greeting the host prints instead; that text match is
 * kept behind ConnectivityProbe so callers never see it.
 */
import { attempt } from '@logosdx/utils'

import { observer } from '../observer.js'

import type { CommandRunner } from './runner.js'
import type { StepOutcome } from './agent.js'


/**
 * Checks whether a host alias authenticates.
 */
export interface ConnectivityProbe {

    check(host: string): Promise<StepOutcome>
}


/**
 * Options for SshConnectivityProbe.
 */
export interface SshProbeOptions {

    /** Remote user, e.g. `git` */
    user: string

    /** Text the host prints after a successful authentication */
    successPhrase: string

    /** Kill ssh after this long */
    timeoutMs: number

    /** Client config to read instead of the default (`ssh -F`) */
    configFile?: string
}


/**
 * Whether probe output contains the success phrase (case-insensitive).
 *
 * @example
 * ```typescript
 * classifyProbeOutput("Hi jane! You've successfully authenticated, but ...", 'successfully authenticated') // true
 * classifyProbeOutput('git@github.com: Permission denied (publickey).', 'successfully authenticated')      // false
 * ```
 */
export function classifyProbeOutput(output: string, successPhrase: string): boolean {

    return output.toLowerCase().includes(successPhrase.toLowerCase())
}


/**
 * First non-empty line, for a one-line summary of ssh's output.
 */
function summarize(output: string): string {

    const line = output.split('\n').map((l) => l.trim()).find(Boolean)

    return line ?? ''
}


/**
 * ConnectivityProbe running `ssh -T` in batch mode.
 */
export class SshConnectivityProbe implements ConnectivityProbe {

    readonly #runner: CommandRunner
    readonly #options: SshProbeOptions

    constructor(
        runner: CommandRunner,
        options: SshProbeOptions,
    ) {

        this.#runner = runner
        this.#options = options
    }

    async check(host: string): Promise<StepOutcome> {

        const { user, successPhrase, timeoutMs, configFile } = this.#options

        const args = [
            ...(configFile ? ['-F', configFile] : []),
            '-T',
            '-o', 'BatchMode=yes',
            '-o', 'StrictHostKeyChecking=accept-new',
            '-o', 'ConnectTimeout=10',
            `${user}@${host}`,
        ]

        const [result, err] = await attempt(() => this.#runner.run('ssh', args, { timeoutMs }))

        let outcome: StepOutcome

        if (err) {

            outcome = { ok: false, detail: err.message }
        }
        else {

            const output = `${result.stdout}\n${result.stderr}`

            outcome = {
                ok: classifyProbeOutput(output, successPhrase),
                detail: summarize(output) || `ssh exited with code ${result.code}`,
            }
        }

        observer.emit('probe:complete', { host, ...outcome })

        return outcome
    }
}
