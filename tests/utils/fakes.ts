/**
 * In-process stand-ins for the external programs gitenv drives, and a
 * context builder over a throwaway home directory.
 *
 * @example
 * ```typescript
 * const env = await createTestEnv()
 * await addEnvironment(env.ctx, input, hooks)
 * await env.cleanup()
 * ```
 */
import { mkdtemp, realpath, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

import { createEnvContext, parseSettings, resolvePaths } from '../../src/core/index.js'
import { KeyGenerationError } from '../../src/core/process/keygen.js'

import type { EnvContext, GitUser, Settings, WorkspacePaths } from '../../src/core/index.js'
import type { CommandRunner, RunOptions, RunResult } from '../../src/core/process/runner.js'
import type { KeyGenerator, KeyType } from '../../src/core/process/keygen.js'
import type { SshAgent, StepOutcome } from '../../src/core/process/agent.js'
import type { ConnectivityProbe } from '../../src/core/process/probe.js'
import type { GitIdentityReader } from '../../src/core/process/git-reader.js'
import type { Clipboard } from '../../src/core/process/clipboard.js'
import type { BrowserLauncher } from '../../src/core/process/browser.js'


// ─────────────────────────────────────────────────────────────
// Runner
// ─────────────────────────────────────────────────────────────

export interface RecordedCall {

    command: string
    args: string[]
    options: RunOptions
}


type Reply = RunResult | Error | ((call: RecordedCall) => RunResult)


/**
 * CommandRunner that answers from a script instead of spawning.
 *
 * Commands without a scripted reply exit 0 with no output.
 */
export class FakeRunner implements CommandRunner {

    readonly calls: RecordedCall[] = []
    readonly #replies = new Map<string, Reply[]>()

    /**
     * Queue a reply for `command`. The last queued reply repeats.
     */
    reply(command: string, reply: Reply): this {

        const queue = this.#replies.get(command) ?? []

        queue.push(reply)
        this.#replies.set(command, queue)

        return this
    }

    async run(command: string, args: string[], options: RunOptions = {}): Promise<RunResult> {

        const call: RecordedCall = { command, args, options }

        this.calls.push(call)

        const queue = this.#replies.get(command) ?? []
        const reply = queue.length > 1 ? queue.shift() : queue[0]

        if (reply === undefined) return { code: 0, stdout: '', stderr: '' }
        if (reply instanceof Error) throw reply
        if (typeof reply === 'function') return reply(call)

        return reply
    }

    commands(): string[] {

        return this.calls.map((call) => call.command)
    }
}


// ─────────────────────────────────────────────────────────────
// Adapters
// ─────────────────────────────────────────────────────────────

export const TEST_PUBLIC_KEY = 'ssh-ed25519 AAAAC3NzaC1lZDI1NTE5AAAAItest-key'


/**
 * Writes placeholder key files where ssh-keygen would.
 */
export class FakeKeyGenerator implements KeyGenerator {

    readonly generated: Array<{ keyPath: string; comment: string; keyType: KeyType }> = []
    failWith: string | null = null

    async generate(keyPath: string, comment: string, keyType: KeyType): Promise<void> {

        if (this.failWith !== null) {

            throw new KeyGenerationError(keyPath, this.failWith)
        }

        await writeFile(keyPath, 'test-private-key\n')
        await writeFile(`${keyPath}.pub`, `${TEST_PUBLIC_KEY} ${comment}\n`)

        this.generated.push({ keyPath, comment, keyType })
    }
}


export class FakeAgent implements SshAgent {

    readonly added: string[] = []
    clearCount = 0
    addOutcome: StepOutcome = { ok: true, detail: 'Identity added' }
    clearOutcome: StepOutcome = { ok: true, detail: 'All identities removed.' }

    async add(keyPath: string): Promise<StepOutcome> {

        this.added.push(keyPath)

        return this.addOutcome
    }

    async clear(): Promise<StepOutcome> {

        this.clearCount++

        return this.clearOutcome
    }
}


export class FakeProbe implements ConnectivityProbe {

    readonly hosts: string[] = []
    outcome: StepOutcome = { ok: true, detail: 'Hi jane! You\'ve successfully authenticated' }

    async check(host: string): Promise<StepOutcome> {

        this.hosts.push(host)

        return this.outcome
    }
}


/**
 * Answers with a fixed user per directory; unknown directories throw.
 */
export class FakeGitReader implements GitIdentityReader {

    readonly users = new Map<string, GitUser>()
    readonly directories: string[] = []

    async readIn(directory: string): Promise<GitUser> {

        this.directories.push(directory)

        const user = this.users.get(directory)

        if (!user) throw new Error(`not a git directory: ${directory}`)

        return user
    }
}


export class FakeClipboard implements Clipboard {

    readonly copied: string[] = []
    works = true

    async copy(text: string): Promise<boolean> {

        if (!this.works) return false

        this.copied.push(text)

        return true
    }
}


export class FakeBrowser implements BrowserLauncher {

    readonly opened: string[] = []
    works = true

    async open(url: string): Promise<boolean> {

        this.opened.push(url)

        return this.works
    }
}


export interface FakeAdapters {

    keygen: FakeKeyGenerator
    agent: FakeAgent
    probe: FakeProbe
    gitReader: FakeGitReader
    clipboard: FakeClipboard
    browser: FakeBrowser
}


export function createFakeAdapters(): FakeAdapters {

    return {
        keygen: new FakeKeyGenerator(),
        agent: new FakeAgent(),
        probe: new FakeProbe(),
        gitReader: new FakeGitReader(),
        clipboard: new FakeClipboard(),
        browser: new FakeBrowser(),
    }
}


// ─────────────────────────────────────────────────────────────
// Context
// ─────────────────────────────────────────────────────────────

export interface TestEnv {

    /** Real path of the temporary home directory */
    home: string

    settings: Settings
    paths: WorkspacePaths
    fakes: FakeAdapters
    ctx: EnvContext

    cleanup(): Promise<void>
}


/**
 * Build an EnvContext rooted in a fresh temp directory.
 *
 * The keychain option is forced off so stanzas do not depend on the host OS.
 */
export async function createTestEnv(settingsInput: Record<string, unknown> = {}): Promise<TestEnv> {

    const home = await realpath(await mkdtemp(join(tmpdir(), 'gitenv-test-')))

    const settings = parseSettings({
        ...settingsInput,
        ssh: { useKeychain: false },
    })

    const paths = resolvePaths(settings, home)
    const fakes = createFakeAdapters()

    return {
        home,
        settings,
        paths,
        fakes,
        ctx: createEnvContext(settings, paths, fakes),
        cleanup: () => rm(home, { recursive: true, force: true }),
    }
}


/**
 * Let React effects and Ink re-renders settle.
 */
export function tick(ms = 30): Promise<void> {

    return new Promise((resolve) => setTimeout(resolve, ms))
}
