/**
 * Git identity verification.
 */
import type { GitUser, Identity } from '../identity/types.js'
import type { EnvContext } from './context.js'


/**
 * What Git resolved inside the working directory, and whether it is the
 * expected user.
 */
export interface GitVerification extends GitUser {

    matches: boolean
}


/**
 * Read back the Git identity effective in the identity's working directory
 * and compare it to `expected`.
 *
 * @throws Error if git cannot be run in the directory
 */
export async function verifyGitIdentity(
    ctx: EnvContext,
    identity: Identity,
    expected: GitUser,
): Promise<GitVerification> {

    const actual = await ctx.adapters.gitReader.readIn(identity.codeDirectory)

    return {
        ...actual,
        matches: actual.name === expected.name && actual.email === expected.email,
    }
}
