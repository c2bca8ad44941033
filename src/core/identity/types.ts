/**
 * Identity types.
 *
 * An identity (also called an environment) is one named Git+SSH profile:
 * a keypair, an SSH host alias, a Git user fragment and a working directory.
 * Nothing records these in a manifest; every path below is derived from the
 * id and the injected WorkspacePaths.
 */


/**
 * Git user written into an identity's fragment.
 */
export interface GitUser {

    /** Git `user.name` */
    name: string

    /** Git `user.email` */
    email: string
}


/**
 * A fully derived identity.
 *
 * @example
 * ```typescript
 * const identity: Identity = {
 *     id: 'pepsi',
 *     sshHost: 'github.com-pepsi',
 *     keyPath: '/home/jane/.ssh/id_ed25519_pepsi',
 *     pubKeyPath: '/home/jane/.ssh/id_ed25519_pepsi.pub',
 *     fragmentPath: '/home/jane/.gitconfig-pepsi',
 *     codeDirectory: '/home/jane/code/pepsi',
 * }
 * ```
 */
export interface Identity {

    /** Sanitized id, only `[A-Za-z0-9_-]` */
    id: string

    /** SSH host alias used in remote URLs */
    sshHost: string

    /** Private key */
    keyPath: string

    /** Public key (keyPath + `.pub`) */
    pubKeyPath: string

    /** Per-identity Git config fragment */
    fragmentPath: string

    /** Working directory whose repositories pick up the fragment */
    codeDirectory: string
}
