/**
 * ssh-agent registration.
 *
 * Loading a key into the agent is a convenience: failures are reported and
 * the caller carries on.
 */
import { attempt } from '@logosdx/utils'

import type { CommandRunner } from './runner.js'


/**
 * Outcome of a best-effort external step.
 */
export interface StepOutcome {

    ok: boolean

    /** Program output or the reason it failed */
    detail: string
}


/**
 * Adds keys to, and clears keys from, the running agent.
 */
export interface SshAgent {

    add(keyPath: string): Promise<StepOutcome>
    clear(): Promise<StepOutcome>
}


/**
 * SshAgent backed by `ssh-add`.
 */
export class SshAddAgent implements SshAgent {

    readonly #runner: CommandRunner
    readonly #useKeychain: boolean

    constructor(
        runner: CommandRunner,
        useKeychain: boolean,
    ) {

        this.#runner = runner
        this.#useKeychain = useKeychain
    }

    add(keyPath: string): Promise<StepOutcome> {

        const args = this.#useKeychain ? ['--apple-use-keychain', keyPath] : [keyPath]

        return this.#sshAdd(args)
    }

    clear(): Promise<StepOutcome> {

        return this.#sshAdd(['-D'])
    }

    async #sshAdd(args: string[]): Promise<StepOutcome> {

        const [result, err] = await attempt(() => this.#runner.run('ssh-add', args))

        if (err) {

            return { ok: false, detail: err.message }
        }

        const output = `${result.stdout}${result.stderr}`.trim()

        return {
            ok: result.code === 0,
            detail: output || `ssh-add exited with code ${result.code}`,
        }
    }
}
