/**
 * Filesystem identity store.
 *
 * The only code that reads or writes the flat files identities live in:
 * keypairs and the shared client config under the SSH directory, the main
 * Git config, and one Git fragment per identity. Lifecycle operations go
 * through this class so de-duplication rules are enforced in one place.
 *
 * @example
 * ```typescript
 * const store = new IdentityStore(paths, settings)
 * const identity = deriveIdentity('work', paths, settings)
 *
 * await store.ensureLayout(identity)
 * await store.upsertIdentity(identity, { name: 'Jane Doe', email: 'jane@example.com' })
 *
 * const all = await store.listIdentities()
 * ```
 */
import { chmod, mkdir, open, readFile, readdir, rm, stat, writeFile } from 'node:fs/promises'
import { dirname, join } from 'node:path'
import { attempt } from '@logosdx/utils'

import { observer } from '../observer.js'
import { isMac } from '../environment.js'
import { toHomeRelative } from '../settings/paths.js'
import { deriveIdentity } from '../identity/derive.js'
import { isValidIdentityId } from '../identity/sanitize.js'
import {
    appendIncludeBlock,
    includeHeader,
    removeIncludeBlock,
    removeSshStanza,
    parseFragment,
    renderFragment,
    renderIncludeBlock,
    renderSshStanza,
    upsertSshStanza,
} from './config-text.js'

import type { Settings, WorkspacePaths } from '../settings/types.js'
import type { GitUser, Identity } from '../identity/types.js'


/** SSH directory: owner only */
const SSH_DIR_MODE = 0o700

/** Keys and the client config: owner read/write only */
const PRIVATE_FILE_MODE = 0o600


/**
 * Outcome of removing an identity's files.
 */
export interface RemoveResult {

    /** Files deleted, and config files rewritten without the identity */
    removed: string[]

    /** Config edits that failed; the identity's key files are still gone */
    warnings: string[]
}


/**
 * Outcome of writing an identity's configuration.
 */
export interface UpsertResult {

    /** An existing stanza for the alias was replaced instead of appended */
    replacedStanza: boolean

    /** The include block was appended (false when its header already existed) */
    addedInclude: boolean
}


function isMissing(err: Error): boolean {

    return 'code' in err && err.code === 'ENOENT'
}


/**
 * Read a text file, treating a missing file as empty.
 */
async function readText(path: string): Promise<string> {

    const [content, err] = await attempt(() => readFile(path, 'utf-8'))

    if (err) {

        if (isMissing(err)) return ''

        throw new Error(`Failed to read ${path}: ${err.message}`)
    }

    return content
}


/**
 * Delete a file. Returns false when it did not exist.
 */
async function removeFile(path: string): Promise<boolean> {

    const [, err] = await attempt(() => rm(path))

    if (err) {

        if (isMissing(err)) return false

        throw new Error(`Failed to remove ${path}: ${err.message}`)
    }

    return true
}


/**
 * List regular files in a directory whose names start with `prefix`.
 */
async function listPrefixed(directory: string, prefix: string): Promise<string[]> {

    const [entries, err] = await attempt(() => readdir(directory, { withFileTypes: true }))

    if (err) {

        if (isMissing(err)) return []

        throw new Error(`Failed to read ${directory}: ${err.message}`)
    }

    return entries
        .filter((entry) => entry.isFile() && entry.name.startsWith(prefix))
        .map((entry) => entry.name)
        .sort()
}


/**
 * Repository over the flat files that make up every identity.
 */
export class IdentityStore {

    readonly #paths: WorkspacePaths
    readonly #settings: Settings

    constructor(paths: WorkspacePaths, settings: Settings) {

        this.#paths = paths
        this.#settings = settings
    }

    get paths(): WorkspacePaths {

        return this.#paths
    }

    // ─────────────────────────────────────────────────────────────
    // Layout
    // ─────────────────────────────────────────────────────────────

    /**
     * Create the SSH directory (700), the identity's working directory and
     * an empty client config (600) when they are missing.
     */
    async ensureLayout(identity: Identity): Promise<void> {

        const { sshDir, sshConfig } = this.#paths

        await mkdir(sshDir, { recursive: true, mode: SSH_DIR_MODE })
        await chmod(sshDir, SSH_DIR_MODE)

        await mkdir(identity.codeDirectory, { recursive: true })
        await mkdir(dirname(sshConfig), { recursive: true })
        await mkdir(dirname(identity.fragmentPath), { recursive: true })
        await mkdir(dirname(this.#paths.gitConfig), { recursive: true })

        const handle = await open(sshConfig, 'a', PRIVATE_FILE_MODE)
        await handle.close()
        await chmod(sshConfig, PRIVATE_FILE_MODE)
    }

    /**
     * Whether the identity's private key or fragment already exists.
     */
    async hasCollision(identity: Identity): Promise<boolean> {

        const [keyStat] = await attempt(() => stat(identity.keyPath))
        const [fragmentStat] = await attempt(() => stat(identity.fragmentPath))

        return !!keyStat || !!fragmentStat
    }

    // ─────────────────────────────────────────────────────────────
    // Writes
    // ─────────────────────────────────────────────────────────────

    /**
     * Delete the identity's keypair and fragment, then strip its include
     * block and SSH stanza from the shared configs.
     *
     * Config edits are best-effort: a failure becomes a warning.
     *
     * @throws Error if a key file or the fragment exists but cannot be deleted
     */
    async removeIdentity(identity: Identity): Promise<RemoveResult> {

        const removed: string[] = []
        const warnings: string[] = []

        for (const path of [identity.keyPath, identity.pubKeyPath, identity.fragmentPath]) {

            if (await removeFile(path)) removed.push(path)
        }

        const header = includeHeader(this.#display(identity.codeDirectory))

        const [includeStripped, includeErr] = await attempt(() =>
            this.#rewrite(this.#paths.gitConfig, (text) => removeIncludeBlock(text, header).content)
        )

        if (includeErr) {

            warnings.push(`Could not remove include block from ${this.#paths.gitConfig}: ${includeErr.message}`)
        }
        else if (includeStripped) {

            removed.push(this.#paths.gitConfig)
        }

        const [stanzaStripped, stanzaErr] = await attempt(() =>
            this.#rewrite(this.#paths.sshConfig, (text) => removeSshStanza(text, identity.sshHost).content)
        )

        if (stanzaErr) {

            warnings.push(`Could not remove ${identity.sshHost} from ${this.#paths.sshConfig}: ${stanzaErr.message}`)
        }
        else if (stanzaStripped) {

            removed.push(this.#paths.sshConfig)
        }

        observer.emit('store:removed', { id: identity.id, paths: removed })

        return { removed, warnings }
    }

    /**
     * Write the identity's SSH stanza, include block and fragment.
     *
     * The stanza replaces any existing one for the same alias; the include
     * block is appended only when its header line is absent; the fragment is
     * always overwritten.
     */
    async upsertIdentity(identity: Identity, user: GitUser): Promise<UpsertResult> {

        const { host, ssh } = this.#settings

        const stanza = renderSshStanza({
            alias: identity.sshHost,
            hostname: host.hostname,
            user: host.user,
            identityFile: this.#display(identity.keyPath),
            useKeychain: ssh.useKeychain ?? isMac(),
        })

        const sshText = await readText(this.#paths.sshConfig)
        const sshResult = upsertSshStanza(sshText, identity.sshHost, stanza)

        await writeFile(this.#paths.sshConfig, sshResult.content, { mode: PRIVATE_FILE_MODE })
        await chmod(this.#paths.sshConfig, PRIVATE_FILE_MODE)

        const block = renderIncludeBlock(
            this.#display(identity.codeDirectory),
            this.#display(identity.fragmentPath),
        )

        const gitText = await readText(this.#paths.gitConfig)
        const gitResult = appendIncludeBlock(gitText, block)

        if (gitResult.added) {

            await writeFile(this.#paths.gitConfig, gitResult.content)
        }

        await writeFile(identity.fragmentPath, renderFragment(user))

        const result: UpsertResult = {
            replacedStanza: sshResult.replaced,
            addedInclude: gitResult.added,
        }

        observer.emit('store:upserted', { id: identity.id, ...result })

        return result
    }

    /**
     * chmod 600 both key files.
     */
    async setKeyPermissions(identity: Identity): Promise<void> {

        await chmod(identity.keyPath, PRIVATE_FILE_MODE)
        await chmod(identity.pubKeyPath, PRIVATE_FILE_MODE)
    }

    // ─────────────────────────────────────────────────────────────
    // Reads
    // ─────────────────────────────────────────────────────────────

    /**
     * Every identity with a fragment file, sorted by id.
     *
     * Fragments are the authoritative enumeration: an identity whose key or
     * working directory is missing is still listed.
     */
    async listIdentities(): Promise<Identity[]> {

        const prefix = this.#settings.naming.fragmentPrefix
        const names = await listPrefixed(this.#paths.fragmentDir, prefix)

        return names
            .map((name) => name.slice(prefix.length))
            .filter(isValidIdentityId)
            .map((id) => deriveIdentity(id, this.#paths, this.#settings))
    }

    /**
     * The trimmed public key, or null when it does not exist.
     */
    async readPublicKey(identity: Identity): Promise<string | null> {

        const content = await readText(identity.pubKeyPath)

        return content.trim() || null
    }

    /**
     * The Git user written into the identity's fragment, or null when the
     * fragment is missing or lacks either key.
     */
    async readFragment(identity: Identity): Promise<GitUser | null> {

        return parseFragment(await readText(identity.fragmentPath))
    }

    /**
     * Whether the identity's working directory exists.
     */
    async hasWorkingDirectory(identity: Identity): Promise<boolean> {

        const [info] = await attempt(() => stat(identity.codeDirectory))

        return !!info && info.isDirectory()
    }

    /**
     * Whether the identity's private key exists.
     */
    async hasKey(identity: Identity): Promise<boolean> {

        const [info] = await attempt(() => stat(identity.keyPath))

        return !!info
    }

    // ─────────────────────────────────────────────────────────────
    // Blanket resets
    // ─────────────────────────────────────────────────────────────

    /**
     * Delete every key file carrying the key prefix and the client config.
     *
     * @returns Paths that existed and were removed
     */
    async resetSsh(): Promise<string[]> {

        const { sshDir, sshConfig } = this.#paths
        const names = await listPrefixed(sshDir, this.#settings.naming.keyPrefix)
        const removed: string[] = []

        for (const path of [...names.map((name) => join(sshDir, name)), sshConfig]) {

            if (await removeFile(path)) removed.push(path)
        }

        return removed
    }

    /**
     * Delete the main Git config and every fragment.
     *
     * @returns Paths that existed and were removed
     */
    async resetGit(): Promise<string[]> {

        const { fragmentDir, gitConfig } = this.#paths
        const names = await listPrefixed(fragmentDir, this.#settings.naming.fragmentPrefix)
        const removed: string[] = []

        for (const path of [gitConfig, ...names.map((name) => join(fragmentDir, name))]) {

            if (await removeFile(path)) removed.push(path)
        }

        return removed
    }

    // ─────────────────────────────────────────────────────────────
    // Internals
    // ─────────────────────────────────────────────────────────────

    #display(path: string): string {

        return toHomeRelative(path, this.#paths.homeDir)
    }

    /**
     * Apply a text transform to a file. Missing files are left alone.
     *
     * @returns true when the file changed
     */
    async #rewrite(path: string, transform: (text: string) => string): Promise<boolean> {

        const before = await readText(path)

        if (!before) return false

        const after = transform(before)

        if (after === before) return false

        await writeFile(path, after)

        return true
    }
}
