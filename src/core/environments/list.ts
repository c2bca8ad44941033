/**
 * List & verify.
 *
 * Read-only apart from the scratch repository the Git read-back creates.
 */
import { attempt } from '@logosdx/utils'

import { observer } from '../observer.js'

import type { GitUser, Identity } from '../identity/types.js'
import type { StepOutcome } from '../process/agent.js'
import type { EnvContext } from './context.js'


/**
 * Status of one identity.
 */
export interface EnvironmentReport {

    identity: Identity

    /** Private key is present */
    hasKey: boolean

    /** Working directory is present */
    directoryExists: boolean

    /** User recorded in the fragment */
    expected: GitUser | null

    /**
     * Git identity inside the working directory; null when the directory
     * is missing or the read-back failed (see gitError)
     */
    git: (GitUser & { matches: boolean }) | null

    gitError?: string

    ssh: StepOutcome
}


/**
 * Report on every identity that has a fragment.
 *
 * The Git read-back runs only when the working directory exists; the SSH
 * probe runs for every identity. Identities are checked one at a time.
 */
export async function listEnvironments(ctx: EnvContext): Promise<EnvironmentReport[]> {

    const { store, adapters } = ctx
    const identities = await store.listIdentities()
    const reports: EnvironmentReport[] = []

    for (const identity of identities) {

        const expected = await store.readFragment(identity)
        const directoryExists = await store.hasWorkingDirectory(identity)

        const report: EnvironmentReport = {
            identity,
            hasKey: await store.hasKey(identity),
            directoryExists,
            expected,
            git: null,
            ssh: { ok: false, detail: '' },
        }

        if (directoryExists) {

            const [actual, err] = await attempt(() => adapters.gitReader.readIn(identity.codeDirectory))

            if (err) {

                report.gitError = err.message
                observer.emit('error', { source: 'list', error: err, context: { id: identity.id } })
            }
            else {

                report.git = {
                    ...actual,
                    matches: !!expected
                        && actual.name === expected.name
                        && actual.email === expected.email,
                }
            }
        }

        report.ssh = await adapters.probe.check(identity.sshHost)
        reports.push(report)
    }

    observer.emit('list:complete', { count: reports.length })

    return reports
}
