/**
 * Identity derivation.
 *
 * Every location belonging to an identity is a pure function of its id,
 * the resolved WorkspacePaths and the naming/host settings.
 */
import { join } from 'node:path'

import { isValidIdentityId } from './sanitize.js'

import type { Settings, WorkspacePaths } from '../settings/types.js'
import type { Identity } from './types.js'


/**
 * Raised when an id is empty or holds characters outside `[A-Za-z0-9_-]`.
 */
export class InvalidIdentityError extends Error {

    override readonly name = 'InvalidIdentityError' as const

    constructor(public readonly rawId: string) {

        super(
            rawId.length
                ? `Invalid identity id "${rawId}": use letters, digits, "-" or "_"`
                : 'Identity id must not be empty'
        )
    }
}


/**
 * Derive an identity's paths and host alias.
 *
 * @throws InvalidIdentityError if `id` is not a valid, already sanitized id
 *
 * @example
 * ```typescript
 * const identity = deriveIdentity('pepsi', paths, settings)
 * identity.sshHost  // 'github.com-pepsi'
 * ```
 */
export function deriveIdentity(id: string, paths: WorkspacePaths, settings: Settings): Identity {

    if (!isValidIdentityId(id)) {

        throw new InvalidIdentityError(id)
    }

    const keyPath = join(paths.sshDir, settings.naming.keyPrefix + id)

    return {
        id,
        sshHost: `${settings.host.hostname}-${id}`,
        keyPath,
        pubKeyPath: `${keyPath}.pub`,
        fragmentPath: join(paths.fragmentDir, settings.naming.fragmentPrefix + id),
        codeDirectory: join(paths.codeDir, id),
    }
}
