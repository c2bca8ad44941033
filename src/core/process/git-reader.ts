/**
 * Git identity read-back.
 *
 * Asks Git which user.name and user.email a repository inside a directory
 * would get, by creating a throwaway repository there. This exercises the
 * real includeIf evaluation instead of re-implementing it.
 */
import { mkdtemp, rm } from 'node:fs/promises'
import { join } from 'node:path'
import { attempt } from '@logosdx/utils'

import { observer } from '../observer.js'

import type { GitUser } from '../identity/types.js'
import type { CommandRunner } from './runner.js'


/**
 * Reported for a key Git has no value for.
 */
export const UNSET_SENTINEL = '(unset)'

/** Scratch repositories are created with this prefix */
const SCRATCH_PREFIX = '.gitenv-verify-'


/**
 * Reads the Git identity effective inside a directory.
 */
export interface GitIdentityReader {

    readIn(directory: string): Promise<GitUser>
}


/**
 * Options for GitConfigReader.
 */
export interface GitConfigReaderOptions {

    /** Main Git config to evaluate (GIT_CONFIG_GLOBAL) */
    gitConfig: string

    /** Directory `~` expands to in the config files */
    homeDir: string
}


/**
 * GitIdentityReader backed by the `git` binary.
 *
 * @example
 * ```typescript
 * const reader = new GitConfigReader(runner, { gitConfig: paths.gitConfig, homeDir: paths.homeDir })
 * const { name, email } = await reader.readIn('/home/jane/code/work')
 * ```
 */
export class GitConfigReader implements GitIdentityReader {

    readonly #runner: CommandRunner
    readonly #options: GitConfigReaderOptions

    constructor(
        runner: CommandRunner,
        options: GitConfigReaderOptions,
    ) {

        this.#runner = runner
        this.#options = options
    }

    /**
     * @throws Error if the scratch repository cannot be created or git fails
     */
    async readIn(directory: string): Promise<GitUser> {

        const scratch = await mkdtemp(join(directory, SCRATCH_PREFIX))

        try {

            const init = await this.#git(scratch, ['init', '-q'])

            if (init.code !== 0) {

                throw new Error(`git init failed in ${scratch}: ${init.stderr.trim()}`)
            }

            const user: GitUser = {
                name: await this.#readKey(scratch, 'user.name'),
                email: await this.#readKey(scratch, 'user.email'),
            }

            observer.emit('verify:complete', { directory, ...user })

            return user
        }
        finally {

            const [, rmErr] = await attempt(() => rm(scratch, { recursive: true, force: true }))

            if (rmErr) {

                observer.emit('error', { source: 'git-reader', error: rmErr, context: { scratch } })
            }
        }
    }

    async #readKey(cwd: string, key: string): Promise<string> {

        const result = await this.#git(cwd, ['config', '--get', key])

        // Exit code 1 means the key is not set anywhere
        if (result.code === 1) return UNSET_SENTINEL

        if (result.code !== 0) {

            throw new Error(`git config ${key} failed: ${result.stderr.trim()}`)
        }

        return result.stdout.trim() || UNSET_SENTINEL
    }

    #git(cwd: string, args: string[]) {

        return this.#runner.run('git', args, {
            cwd,
            env: {
                GIT_CONFIG_GLOBAL: this.#options.gitConfig,
                HOME: this.#options.homeDir,
            },
        })
    }
}
