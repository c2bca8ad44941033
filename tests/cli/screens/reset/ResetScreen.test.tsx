/**
 * Reset screen tests.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { access } from 'node:fs/promises'

import { ResetGitScreen, ResetSshScreen } from '../../../../src/cli/screens/reset/index.js'
import { addEnvironment } from '../../../../src/core/environments/add.js'
import { createTestEnv, tick, type TestEnv } from '../../../utils/fakes.js'
import { KEYS, waitForText } from '../../../utils/ink.js'
import { renderScreen } from '../../../utils/screen.js'

import type { AddEnvironmentHooks } from '../../../../src/core/environments/add.js'


const HOOKS: AddEnvironmentHooks = {
    confirmOverwrite: () => true,
    awaitRegistration: (gate) => {

        gate.answer('yes')
    },
}


describe('cli: screens/reset', () => {

    let env: TestEnv

    beforeEach(async () => {

        env = await createTestEnv()
    })

    afterEach(async () => {

        await env.cleanup()
    })

    async function addPepsi(): Promise<void> {

        await addEnvironment(env.ctx, { rawId: 'pepsi', name: 'Jane Doe', email: 'jane@example.com' }, HOOKS)
    }

    describe('ResetSshScreen', () => {

        it('should ask before deleting, defaulting to No', () => {

            const { lastFrame } = renderScreen(<ResetSshScreen params={{}} />, env, { initialRoute: 'reset/ssh' })

            expect(lastFrame()).toContain('Reset SSH')
            expect(lastFrame()).toContain('❯ No (n)')
        })

        it('should return to the menu without touching files on Enter', async () => {

            await addPepsi()

            const { stdin, lastFrame } = renderScreen(<ResetSshScreen params={{}} />, env, { initialRoute: 'reset/ssh' })

            await tick()
            stdin.write(KEYS.enter)
            await tick()

            expect(lastFrame()).toContain('route:home')
            await expect(access(env.paths.sshConfig)).resolves.toBeUndefined()
            expect(env.fakes.agent.clearCount).toBe(0)
        })

        it('should list removed files after confirming', async () => {

            await addPepsi()

            const { stdin, lastFrame } = renderScreen(<ResetSshScreen params={{}} />, env, { initialRoute: 'reset/ssh' })

            await tick()
            stdin.write('y')

            const frame = await waitForText(lastFrame, 'Removed 3 file(s):')

            expect(frame).toContain('~/.ssh/id_ed25519_pepsi')
            expect(frame).toContain('~/.ssh/id_ed25519_pepsi.pub')
            expect(frame).toContain('~/.ssh/config')
            expect(frame).toContain('ssh-agent cleared')
            expect(env.fakes.agent.clearCount).toBe(1)
        })

        it('should say when the agent could not be cleared', async () => {

            env.fakes.agent.clearOutcome = { ok: false, detail: 'Could not open a connection to your authentication agent.' }

            const { stdin, lastFrame } = renderScreen(<ResetSshScreen params={{}} />, env, { initialRoute: 'reset/ssh' })

            await tick()
            stdin.write('y')

            const frame = await waitForText(lastFrame, 'ssh-agent not cleared')

            expect(frame).toContain('Nothing to remove')
        })

        it('should return to the menu on any key after the result', async () => {

            await addPepsi()

            const { stdin, lastFrame } = renderScreen(<ResetSshScreen params={{}} />, env, { initialRoute: 'reset/ssh' })

            await tick()
            stdin.write('y')
            await waitForText(lastFrame, 'Removed 3 file(s):')
            await tick()

            expect(lastFrame()).toContain('route:reset/ssh')

            stdin.write('x')
            await tick()

            expect(lastFrame()).toContain('route:home')
        })
    })

    describe('ResetGitScreen', () => {

        it('should remove the Git config and fragments', async () => {

            await addPepsi()

            const { stdin, lastFrame } = renderScreen(<ResetGitScreen params={{}} />, env, { initialRoute: 'reset/git' })

            await tick()
            stdin.write('y')

            const frame = await waitForText(lastFrame, 'Removed 2 file(s):')

            expect(frame).toContain('~/.gitconfig')
            expect(frame).toContain('~/.gitconfig-pepsi')
            expect(frame).not.toContain('ssh-agent')
        })

        it('should report an empty reset', async () => {

            const { stdin, lastFrame } = renderScreen(<ResetGitScreen params={{}} />, env, { initialRoute: 'reset/git' })

            await tick()
            stdin.write('y')

            await waitForText(lastFrame, 'Nothing to remove')
        })
    })

    describe('with reset.confirm off', () => {

        beforeEach(async () => {

            await env.cleanup()
            env = await createTestEnv({ reset: { confirm: false } })
        })

        it('should reset without asking', async () => {

            await addPepsi()

            const { lastFrame } = renderScreen(<ResetSshScreen params={{}} />, env, { initialRoute: 'reset/ssh' })

            const frame = await waitForText(lastFrame, 'Removed 3 file(s):')

            expect(frame).not.toContain('❯ No (n)')
            expect(frame).toContain('~/.ssh/config')
            expect(env.fakes.agent.clearCount).toBe(1)
        })
    })
})
