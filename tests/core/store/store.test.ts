import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { readFile, stat, writeFile, mkdir } from 'node:fs/promises'
import { join } from 'node:path'

import { deriveIdentity } from '../../../src/core/identity/derive.js'
import { listSshHosts } from '../../../src/core/store/config-text.js'
import { IdentityStore } from '../../../src/core/store/store.js'
import { createTestEnv, type TestEnv } from '../../utils/fakes.js'

import type { Identity } from '../../../src/core/identity/types.js'


const JANE = { name: 'Jane Doe', email: 'jane@example.com' }


describe('store: identity store', () => {

    let env: TestEnv

    beforeEach(async () => {

        env = await createTestEnv()
    })

    afterEach(async () => {

        await env.cleanup()
    })

    function identity(id: string): Identity {

        return deriveIdentity(id, env.paths, env.settings)
    }

    async function createKey(target: Identity): Promise<void> {

        await writeFile(target.keyPath, 'test-private-key\n')
        await writeFile(target.pubKeyPath, 'ssh-ed25519 AAAAtest jane@example.com\n')
    }

    async function mode(path: string): Promise<number> {

        return (await stat(path)).mode & 0o777
    }

    describe('ensureLayout', () => {

        it('should create the SSH directory, working directory and client config', async () => {

            const pepsi = identity('pepsi')

            await env.ctx.store.ensureLayout(pepsi)

            expect(await mode(env.paths.sshDir)).toBe(0o700)
            expect(await mode(env.paths.sshConfig)).toBe(0o600)
            expect(await readFile(env.paths.sshConfig, 'utf-8')).toBe('')
            expect((await stat(pepsi.codeDirectory)).isDirectory()).toBe(true)
        })

        it('should keep an existing client config', async () => {

            await mkdir(env.paths.sshDir, { recursive: true })
            await writeFile(env.paths.sshConfig, 'Host *\n  ServerAliveInterval 60\n')

            await env.ctx.store.ensureLayout(identity('pepsi'))

            expect(await readFile(env.paths.sshConfig, 'utf-8')).toBe('Host *\n  ServerAliveInterval 60\n')
        })
    })

    describe('hasCollision', () => {

        it('should detect an existing key or fragment', async () => {

            const pepsi = identity('pepsi')

            await env.ctx.store.ensureLayout(pepsi)

            expect(await env.ctx.store.hasCollision(pepsi)).toBe(false)

            await writeFile(pepsi.fragmentPath, '[user]\n')

            expect(await env.ctx.store.hasCollision(pepsi)).toBe(true)
        })
    })

    describe('upsertIdentity', () => {

        it('should write the stanza, include block and fragment', async () => {

            const pepsi = identity('pepsi')

            await env.ctx.store.ensureLayout(pepsi)

            const result = await env.ctx.store.upsertIdentity(pepsi, JANE)

            expect(result).toEqual({ replacedStanza: false, addedInclude: true })

            expect(await readFile(env.paths.sshConfig, 'utf-8')).toBe([
                'Host github.com-pepsi',
                '  HostName github.com',
                '  User git',
                '  IdentityFile ~/.ssh/id_ed25519_pepsi',
                '  AddKeysToAgent yes',
                '  IdentitiesOnly yes',
                '',
            ].join('\n'))

            expect(await readFile(env.paths.gitConfig, 'utf-8'))
                .toBe('[includeIf "gitdir:~/code/pepsi/"]\n\tpath = ~/.gitconfig-pepsi\n')

            expect(await readFile(pepsi.fragmentPath, 'utf-8'))
                .toBe('[user]\n\tname = Jane Doe\n\temail = jane@example.com\n')
        })

        it('should replace instead of duplicating on a second write', async () => {

            const pepsi = identity('pepsi')

            await env.ctx.store.ensureLayout(pepsi)
            await env.ctx.store.upsertIdentity(pepsi, JANE)

            const gitBefore = await readFile(env.paths.gitConfig, 'utf-8')
            const result = await env.ctx.store.upsertIdentity(pepsi, { name: 'J. Doe', email: 'jd@example.com' })

            expect(result).toEqual({ replacedStanza: true, addedInclude: false })
            expect(listSshHosts(await readFile(env.paths.sshConfig, 'utf-8'))).toEqual(['github.com-pepsi'])
            expect(await readFile(env.paths.gitConfig, 'utf-8')).toBe(gitBefore)
            expect(await env.ctx.store.readFragment(pepsi)).toEqual({ name: 'J. Doe', email: 'jd@example.com' })
        })

        it('should append identities in creation order', async () => {

            for (const id of ['beta', 'alpha']) {

                await env.ctx.store.ensureLayout(identity(id))
                await env.ctx.store.upsertIdentity(identity(id), JANE)
            }

            expect(listSshHosts(await readFile(env.paths.sshConfig, 'utf-8')))
                .toEqual(['github.com-beta', 'github.com-alpha'])

            expect(await readFile(env.paths.gitConfig, 'utf-8')).toBe([
                '[includeIf "gitdir:~/code/beta/"]',
                '\tpath = ~/.gitconfig-beta',
                '',
                '[includeIf "gitdir:~/code/alpha/"]',
                '\tpath = ~/.gitconfig-alpha',
                '',
            ].join('\n'))
        })
    })

    describe('removeIdentity', () => {

        it('should remove one identity and leave the others', async () => {

            const pepsi = identity('pepsi')
            const coke = identity('coke')

            for (const target of [pepsi, coke]) {

                await env.ctx.store.ensureLayout(target)
                await createKey(target)
                await env.ctx.store.upsertIdentity(target, JANE)
            }

            const result = await env.ctx.store.removeIdentity(pepsi)

            expect(result.warnings).toEqual([])
            expect(result.removed).toEqual([
                pepsi.keyPath,
                pepsi.pubKeyPath,
                pepsi.fragmentPath,
                env.paths.gitConfig,
                env.paths.sshConfig,
            ])

            expect(await env.ctx.store.hasCollision(pepsi)).toBe(false)
            expect(await env.ctx.store.hasCollision(coke)).toBe(true)
            expect(listSshHosts(await readFile(env.paths.sshConfig, 'utf-8'))).toEqual(['github.com-coke'])
            expect(await readFile(env.paths.gitConfig, 'utf-8'))
                .toBe('[includeIf "gitdir:~/code/coke/"]\n\tpath = ~/.gitconfig-coke\n')
        })

        it('should report nothing for an identity with no files', async () => {

            expect(await env.ctx.store.removeIdentity(identity('ghost'))).toEqual({ removed: [], warnings: [] })
        })
    })

    describe('reads', () => {

        it('should list every identity with a fragment, sorted by id', async () => {

            await writeFile(join(env.home, '.gitconfig-zeta'), '[user]\n')
            await writeFile(join(env.home, '.gitconfig-alpha'), '[user]\n')
            await writeFile(join(env.home, '.gitconfig-bad id'), '[user]\n')
            await writeFile(join(env.home, '.gitconfig'), '')

            const ids = (await env.ctx.store.listIdentities()).map((entry) => entry.id)

            expect(ids).toEqual(['alpha', 'zeta'])
        })

        it('should return an empty list without a fragment directory', async () => {

            const missing = { ...env.paths, fragmentDir: join(env.home, 'nowhere') }
            expect(await new IdentityStore(missing, env.settings).listIdentities()).toEqual([])
        })

        it('should read the public key, key and directory state', async () => {

            const pepsi = identity('pepsi')

            expect(await env.ctx.store.readPublicKey(pepsi)).toBeNull()
            expect(await env.ctx.store.hasKey(pepsi)).toBe(false)
            expect(await env.ctx.store.hasWorkingDirectory(pepsi)).toBe(false)

            await env.ctx.store.ensureLayout(pepsi)
            await createKey(pepsi)

            expect(await env.ctx.store.readPublicKey(pepsi)).toBe('ssh-ed25519 AAAAtest jane@example.com')
            expect(await env.ctx.store.hasKey(pepsi)).toBe(true)
            expect(await env.ctx.store.hasWorkingDirectory(pepsi)).toBe(true)
        })

        it('should restrict key permissions', async () => {

            const pepsi = identity('pepsi')

            await env.ctx.store.ensureLayout(pepsi)
            await createKey(pepsi)
            await env.ctx.store.setKeyPermissions(pepsi)

            expect(await mode(pepsi.keyPath)).toBe(0o600)
            expect(await mode(pepsi.pubKeyPath)).toBe(0o600)
        })
    })

    describe('resets', () => {

        it('should remove prefixed keys and the client config only', async () => {

            const pepsi = identity('pepsi')

            await env.ctx.store.ensureLayout(pepsi)
            await createKey(pepsi)
            await writeFile(join(env.paths.sshDir, 'known_hosts'), 'github.com ssh-ed25519 AAAA\n')
            await writeFile(join(env.paths.sshDir, 'id_rsa'), 'other\n')

            const removed = await env.ctx.store.resetSsh()

            expect(removed).toEqual([pepsi.keyPath, pepsi.pubKeyPath, env.paths.sshConfig])
            expect(await readFile(join(env.paths.sshDir, 'known_hosts'), 'utf-8')).toBe('github.com ssh-ed25519 AAAA\n')
            expect(await env.ctx.store.resetSsh()).toEqual([])
        })

        it('should remove the main Git config and every fragment', async () => {

            for (const id of ['pepsi', 'coke']) {

                await env.ctx.store.ensureLayout(identity(id))
                await env.ctx.store.upsertIdentity(identity(id), JANE)
            }

            const removed = await env.ctx.store.resetGit()

            expect(removed).toEqual([
                env.paths.gitConfig,
                identity('coke').fragmentPath,
                identity('pepsi').fragmentPath,
            ])
            expect(await env.ctx.store.listIdentities()).toEqual([])
            expect(await env.ctx.store.resetGit()).toEqual([])
        })
    })
})
