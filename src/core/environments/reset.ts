/**
 * Blanket resets.
 *
 * Both operations are idempotent: files that are already gone are skipped,
 * so running one twice leaves the same state as running it once. Neither
 * can be rolled back.
 */
import { observer } from '../observer.js'

import type { EnvContext } from './context.js'


export interface ResetSshResult {

    /** Key files and client config that were deleted */
    removed: string[]

    /** ssh-add -D succeeded */
    agentCleared: boolean
}


export interface ResetGitResult {

    /** Main Git config and fragments that were deleted */
    removed: string[]
}


/**
 * Remove every gitenv key, the client config, and all keys from the agent.
 *
 * Clearing the agent is best-effort; a machine without a running agent
 * still gets its files removed.
 */
export async function resetSsh(ctx: EnvContext): Promise<ResetSshResult> {

    const agent = await ctx.adapters.agent.clear()
    const removed = await ctx.store.resetSsh()

    for (const path of removed) {

        observer.emit('reset:removed', { scope: 'ssh', path })
    }

    observer.emit('reset:complete', { scope: 'ssh', count: removed.length })

    return { removed, agentCleared: agent.ok }
}


/**
 * Remove the main Git config and every identity fragment.
 */
export async function resetGit(ctx: EnvContext): Promise<ResetGitResult> {

    const removed = await ctx.store.resetGit()

    for (const path of removed) {

        observer.emit('reset:removed', { scope: 'git', path })
    }

    observer.emit('reset:complete', { scope: 'git', count: removed.length })

    return { removed }
}
