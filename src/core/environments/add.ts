/**
 * Add environment.
 *
 * Creates or re-creates one identity end to end: key, agent, SSH stanza,
 * Git include and fragment, then waits for the user to register the public
 * key before verifying both SSH and Git.
 *
 * Only an invalid id and a failed ssh-keygen abort with an error. Every
 * other problem is collected as a warning or reported in the result.
 *
 * @example
 * ```typescript
 * const result = await addEnvironment(ctx, {
 *     rawId: 'pepsi',
 *     name: 'Jane Doe',
 *     email: 'jane@example.com',
 * }, {
 *     confirmOverwrite: async () => true,
 *     awaitRegistration: (gate) => { promptUser(gate) },
 * })
 * ```
 */
import { attempt } from '@logosdx/utils'

import { observer } from '../observer.js'
import { InvalidIdentityError, deriveIdentity } from '../identity/derive.js'
import { sanitizeIdentityId } from '../identity/sanitize.js'
import { RegistrationGate } from './gate.js'
import { verifyGitIdentity } from './verify.js'

import type { EnvStep } from '../observer.js'
import type { GitUser, Identity } from '../identity/types.js'
import type { StepOutcome } from '../process/agent.js'
import type { EnvContext } from './context.js'
import type { GateState } from './gate.js'
import type { GitVerification } from './verify.js'


export interface AddEnvironmentInput extends GitUser {

    /** Id as typed; sanitized before use */
    rawId: string
}


/**
 * What the UI needs to show while the gate is open.
 */
export interface RegistrationPrompt {

    identity: Identity

    /** Public key text, null if it could not be read */
    publicKey: string | null

    /** Page where the key is pasted */
    keysUrl: string

    /** The key is on the clipboard */
    copied: boolean

    /** keysUrl was opened in a browser */
    browserOpened: boolean
}


/**
 * Callbacks through which add-environment asks the user things.
 */
export interface AddEnvironmentHooks {

    /**
     * The identity's key or fragment exists. Resolve true to replace it.
     */
    confirmOverwrite(identity: Identity): boolean | Promise<boolean>

    /**
     * The gate is open. Feed it answers (or cancel it); add-environment
     * waits on `gate.wait()` after this returns.
     */
    awaitRegistration(gate: RegistrationGate, prompt: RegistrationPrompt): void | Promise<void>

    /** Aborting cancels the registration gate */
    signal?: AbortSignal
}


export type AddEnvironmentStatus = 'aborted' | 'unverified' | 'verified'


export interface AddEnvironmentResult {

    /**
     * - `aborted`: overwrite declined, nothing changed
     * - `unverified`: configured, registration not confirmed
     * - `verified`: configured and both checks ran
     */
    status: AddEnvironmentStatus

    identity: Identity
    publicKey: string | null
    warnings: string[]

    /** Final gate state, when the gate was reached */
    gate?: GateState

    ssh?: StepOutcome
    git?: GitVerification
}


/**
 * Emits `env:step` around each step and turns warnings into events.
 */
class StepReporter {

    readonly warnings: string[] = []
    readonly #id: string

    constructor(id: string) {

        this.#id = id
    }

    running(step: EnvStep): void {

        observer.emit('env:step', { id: this.#id, step, status: 'running' })
    }

    done(step: EnvStep, detail?: string): void {

        observer.emit('env:step', { id: this.#id, step, status: 'done', detail })
    }

    skipped(step: EnvStep, detail?: string): void {

        observer.emit('env:step', { id: this.#id, step, status: 'skipped', detail })
    }

    failed(step: EnvStep, error: Error): void {

        observer.emit('env:step', { id: this.#id, step, status: 'failed', detail: error.message })
        observer.emit('env:failed', { id: this.#id, step, error: error.message })
    }

    warn(step: EnvStep, message: string): void {

        this.warnings.push(message)
        observer.emit('env:warning', { id: this.#id, step, message })
    }
}


/**
 * Run `fn` as `step`; a thrown error is reported as failed and rethrown.
 */
async function runStep<T>(reporter: StepReporter, step: EnvStep, fn: () => Promise<T>): Promise<T> {

    reporter.running(step)

    const [value, err] = await attempt(fn)

    if (err) {

        reporter.failed(step, err)
        throw err
    }

    return value
}


/**
 * Create (or re-create after confirmation) one identity environment.
 *
 * @throws InvalidIdentityError if the id sanitizes to nothing
 * @throws KeyGenerationError if ssh-keygen fails
 */
export async function addEnvironment(
    ctx: EnvContext,
    input: AddEnvironmentInput,
    hooks: AddEnvironmentHooks,
): Promise<AddEnvironmentResult> {

    const { settings, store, adapters } = ctx
    const user: GitUser = { name: input.name.trim(), email: input.email.trim() }

    const id = sanitizeIdentityId(input.rawId)

    if (!id) {

        throw new InvalidIdentityError(input.rawId)
    }

    const identity = deriveIdentity(id, ctx.paths, settings)
    const reporter = new StepReporter(id)

    observer.emit('env:start', { id, sshHost: identity.sshHost })

    // 1. Layout
    await runStep(reporter, 'layout', () => store.ensureLayout(identity))
    reporter.done('layout', identity.codeDirectory)

    // 2. Collision
    reporter.running('collision')

    if (await store.hasCollision(identity)) {

        if (!await hooks.confirmOverwrite(identity)) {

            reporter.skipped('collision', 'overwrite declined')
            observer.emit('env:aborted', { id, reason: 'overwrite declined' })

            return { status: 'aborted', identity, publicKey: null, warnings: [] }
        }

        const removal = await runStep(reporter, 'collision', () => store.removeIdentity(identity))

        for (const warning of removal.warnings) reporter.warn('collision', warning)

        reporter.done('collision', `replaced ${removal.removed.length} file(s)`)
    }
    else {

        reporter.skipped('collision', 'new identity')
    }

    // 3. Key generation
    await runStep(reporter, 'keygen', () =>
        adapters.keygen.generate(identity.keyPath, user.email, settings.ssh.keyType)
    )
    reporter.done('keygen', identity.keyPath)

    // 4. Permissions and agent
    reporter.running('permissions')

    const [, chmodErr] = await attempt(() => store.setKeyPermissions(identity))

    if (chmodErr) {

        reporter.warn('permissions', `Could not restrict key permissions: ${chmodErr.message}`)
    }
    else {

        reporter.done('permissions', '600')
    }

    reporter.running('agent')

    const agent = await adapters.agent.add(identity.keyPath)

    if (agent.ok) {

        reporter.done('agent')
    }
    else {

        reporter.warn('agent', `ssh-add failed: ${agent.detail}`)
    }

    // 5-6. SSH stanza, include block, fragment
    const upsert = await runStep(reporter, 'ssh-config', () => store.upsertIdentity(identity, user))

    reporter.done('ssh-config', upsert.replacedStanza ? `replaced ${identity.sshHost}` : `added ${identity.sshHost}`)
    reporter.done('git-config', upsert.addedInclude ? 'include added' : 'include already present')

    // 7. Publish the public key
    reporter.running('publish')

    const publicKey = await store.readPublicKey(identity)
    const copied = publicKey ? await adapters.clipboard.copy(publicKey) : false
    const browserOpened = await adapters.browser.open(settings.host.keysUrl)

    if (!publicKey) {

        reporter.warn('publish', `Public key not found at ${identity.pubKeyPath}`)
    }

    if (!browserOpened) {

        reporter.warn('publish', `Could not open a browser; visit ${settings.host.keysUrl}`)
    }

    reporter.done('publish', copied ? 'copied to clipboard' : 'shown on screen')

    // 8. Registration gate
    reporter.running('registration')

    const gate = new RegistrationGate({
        id,
        timeoutMs: settings.registration.timeoutMs,
        signal: hooks.signal,
    })

    const timer = settings.registration.timeoutMs === undefined
        ? null
        : setTimeout(() => gate.expire(), settings.registration.timeoutMs)

    let gateState: GateState

    try {

        await hooks.awaitRegistration(gate, {
            identity,
            publicKey,
            keysUrl: settings.host.keysUrl,
            copied,
            browserOpened,
        })

        gateState = await gate.wait()
    }
    finally {

        if (timer) clearTimeout(timer)
    }

    if (gateState !== 'confirmed') {

        reporter.skipped('registration', gateState)
        observer.emit('env:complete', { id, status: 'unverified', sshOk: null, gitMatches: null })

        return {
            status: 'unverified',
            identity,
            publicKey,
            warnings: reporter.warnings,
            gate: gateState,
        }
    }

    reporter.done('registration')

    // 9. SSH verification
    reporter.running('verify-ssh')

    const ssh = await adapters.probe.check(identity.sshHost)

    reporter.done('verify-ssh', ssh.ok ? 'authenticated' : ssh.detail)

    // 10. Git verification
    reporter.running('verify-git')

    const [git, gitErr] = await attempt(() => verifyGitIdentity(ctx, identity, user))

    if (gitErr) {

        reporter.warn('verify-git', `Could not read Git identity: ${gitErr.message}`)
    }
    else {

        reporter.done('verify-git', git.matches ? 'match' : `got ${git.name} <${git.email}>`)
    }

    observer.emit('env:complete', {
        id,
        status: 'verified',
        sshOk: ssh.ok,
        gitMatches: git ? git.matches : null,
    })

    return {
        status: 'verified',
        identity,
        publicKey,
        warnings: reporter.warnings,
        gate: gateState,
        ssh,
        git: git ?? undefined,
    }
}
