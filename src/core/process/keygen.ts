/**
 * SSH key generation.
 *
 * The one external step whose failure aborts add-environment: without a
 * key there is nothing to register.
 */
import { attempt } from '@logosdx/utils'

import type { CommandRunner } from './runner.js'


/**
 * Key algorithms ssh-keygen is asked for.
 */
export type KeyType = 'ed25519' | 'rsa' | 'ecdsa'


/**
 * Raised when ssh-keygen cannot be run or exits non-zero.
 */
export class KeyGenerationError extends Error {

    override readonly name = 'KeyGenerationError' as const

    constructor(
        public readonly keyPath: string,
        public readonly stderr: string,
    ) {

        super(`Failed to generate SSH key ${keyPath}: ${stderr}`)
    }
}


/**
 * Creates a keypair at `keyPath` (public half at `keyPath.pub`).
 */
export interface KeyGenerator {

    /**
     * @throws KeyGenerationError
     */
    generate(keyPath: string, comment: string, keyType: KeyType): Promise<void>
}


/**
 * ssh-keygen with an empty passphrase, quiet, comment set to `comment`.
 *
 * @example
 * ```typescript
 * const keygen = new SshKeyGenerator(new ExecFileRunner())
 * await keygen.generate('/home/jane/.ssh/id_ed25519_work', 'jane@example.com', 'ed25519')
 * ```
 */
export class SshKeyGenerator implements KeyGenerator {

    readonly #runner: CommandRunner

    constructor(runner: CommandRunner) {

        this.#runner = runner
    }

    async generate(keyPath: string, comment: string, keyType: KeyType): Promise<void> {

        const args = ['-t', keyType, '-C', comment, '-f', keyPath, '-N', '', '-q']

        const [result, err] = await attempt(() => this.#runner.run('ssh-keygen', args))

        if (err) {

            throw new KeyGenerationError(keyPath, err.message)
        }

        if (result.code !== 0) {

            throw new KeyGenerationError(keyPath, result.stderr.trim() || `exit code ${result.code}`)
        }
    }
}
