/**
 * Check rows for one environment on the list screen.
 */
import { toHomeRelative } from '../../../core/index.js'

import type { EnvironmentReport, GitUser } from '../../../core/index.js'
import type { StatusListItem } from '../../components/index.js'


function formatUser(user: GitUser): string {

    return `${user.name} <${user.email}>`
}


/**
 * Key, working directory, Git identity and SSH rows for a report.
 *
 * @example
 * ```typescript
 * reportLines(report, '/home/jane')
 * // [
 * //     { key: 'key', label: 'SSH key', status: 'success', detail: '~/.ssh/id_ed25519_work' },
 * //     ...
 * // ]
 * ```
 */
export function reportLines(report: EnvironmentReport, homeDir: string): StatusListItem[] {

    const { identity, git, expected } = report

    const lines: StatusListItem[] = [
        {
            key: 'key',
            label: report.hasKey ? 'SSH key' : 'SSH key missing',
            status: report.hasKey ? 'success' : 'error',
            detail: toHomeRelative(identity.keyPath, homeDir),
        },
        {
            key: 'directory',
            label: report.directoryExists ? 'Working directory' : 'Working directory missing',
            status: report.directoryExists ? 'success' : 'warning',
            detail: toHomeRelative(identity.codeDirectory, homeDir),
        },
    ]

    if (!report.directoryExists) {

        lines.push({ key: 'git', label: 'Git identity', status: 'skipped', detail: 'not checked' })
    }
    else if (report.gitError !== undefined) {

        lines.push({ key: 'git', label: 'Git identity', status: 'error', detail: report.gitError })
    }
    else if (git) {

        lines.push(git.matches
            ? { key: 'git', label: 'Git identity', status: 'success', detail: formatUser(git) }
            : {
                key: 'git',
                label: 'Git identity mismatch',
                status: 'error',
                detail: `got ${formatUser(git)}, expected ${expected ? formatUser(expected) : 'an unreadable fragment'}`,
            }
        )
    }

    lines.push({
        key: 'ssh',
        label: report.ssh.ok ? 'SSH authenticated' : 'SSH failed',
        status: report.ssh.ok ? 'success' : 'error',
        detail: report.ssh.detail || undefined,
    })

    return lines
}
