/**
 * External process adapters.
 *
 * Narrow interfaces over ssh-keygen, ssh-add, ssh, git and the desktop
 * helpers. Lifecycle operations depend on the Adapters bundle only, so tests
 * hand in fakes.
 */
import { homedir } from 'node:os'
import { join } from 'node:path'

import { isMac } from '../environment.js'
import { ExecFileRunner } from './runner.js'
import { SshKeyGenerator } from './keygen.js'
import { SshAddAgent } from './agent.js'
import { SshConnectivityProbe } from './probe.js'
import { GitConfigReader } from './git-reader.js'
import { SystemClipboard } from './clipboard.js'
import { SystemBrowser } from './browser.js'

import type { Settings, WorkspacePaths } from '../settings/types.js'
import type { CommandRunner } from './runner.js'
import type { KeyGenerator } from './keygen.js'
import type { SshAgent } from './agent.js'
import type { ConnectivityProbe } from './probe.js'
import type { GitIdentityReader } from './git-reader.js'
import type { Clipboard } from './clipboard.js'
import type { BrowserLauncher } from './browser.js'


/**
 * Everything a lifecycle operation may launch.
 */
export interface Adapters {

    keygen: KeyGenerator
    agent: SshAgent
    probe: ConnectivityProbe
    gitReader: GitIdentityReader
    clipboard: Clipboard
    browser: BrowserLauncher
}


/**
 * Build the real adapters for the given settings and paths.
 *
 * `ssh -F` is only passed when the client config is not the one ssh reads
 * by default, so system-wide ssh settings still apply in the common case.
 */
export function createAdapters(
    settings: Settings,
    paths: WorkspacePaths,
    runner: CommandRunner = new ExecFileRunner(),
): Adapters {

    const defaultSshConfig = join(homedir(), '.ssh', 'config')

    return {
        keygen: new SshKeyGenerator(runner),
        agent: new SshAddAgent(runner, settings.ssh.useKeychain ?? isMac()),
        probe: new SshConnectivityProbe(runner, {
            user: settings.host.user,
            successPhrase: settings.host.successPhrase,
            timeoutMs: settings.ssh.probeTimeoutMs,
            configFile: paths.sshConfig === defaultSshConfig ? undefined : paths.sshConfig,
        }),
        gitReader: new GitConfigReader(runner, {
            gitConfig: paths.gitConfig,
            homeDir: paths.homeDir,
        }),
        clipboard: new SystemClipboard(runner),
        browser: new SystemBrowser(runner),
    }
}


export { ExecFileRunner, CommandSpawnError } from './runner.js'
export type { CommandRunner, RunOptions, RunResult } from './runner.js'

export { SshKeyGenerator, KeyGenerationError } from './keygen.js'
export type { KeyGenerator, KeyType } from './keygen.js'

export { SshAddAgent } from './agent.js'
export type { SshAgent, StepOutcome } from './agent.js'

export { SshConnectivityProbe, classifyProbeOutput } from './probe.js'
export type { ConnectivityProbe, SshProbeOptions } from './probe.js'

export { GitConfigReader, UNSET_SENTINEL } from './git-reader.js'
export type { GitIdentityReader, GitConfigReaderOptions } from './git-reader.js'

export { SystemClipboard } from './clipboard.js'
export type { Clipboard } from './clipboard.js'

export { SystemBrowser } from './browser.js'
export type { BrowserLauncher } from './browser.js'
