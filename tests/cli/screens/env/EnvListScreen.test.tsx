/**
 * List & verify screen tests.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest'

import { EnvListScreen } from '../../../../src/cli/screens/env/index.js'
import { addEnvironment } from '../../../../src/core/environments/add.js'
import { deriveIdentity } from '../../../../src/core/identity/derive.js'
import { createTestEnv, tick, type TestEnv } from '../../../utils/fakes.js'
import { waitForText } from '../../../utils/ink.js'
import { renderScreen } from '../../../utils/screen.js'

import type { AddEnvironmentHooks } from '../../../../src/core/environments/add.js'


const HOOKS: AddEnvironmentHooks = {
    confirmOverwrite: () => true,
    awaitRegistration: (gate) => {

        gate.answer('yes')
    },
}


describe('cli: screens/env/list', () => {

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

    it('should say when there are no environments', async () => {

        const { lastFrame } = renderScreen(<EnvListScreen params={{}} />, env, { initialRoute: 'env/list' })

        await waitForText(lastFrame, 'No environments found')
    })

    it('should show every check for a healthy environment', async () => {

        const pepsi = deriveIdentity('pepsi', env.paths, env.settings)

        env.fakes.gitReader.users.set(pepsi.codeDirectory, { name: 'Jane Doe', email: 'jane@example.com' })
        await addPepsi()

        const { lastFrame } = renderScreen(<EnvListScreen params={{}} />, env, { initialRoute: 'env/list' })

        const frame = await waitForText(lastFrame, 'SSH authenticated')

        expect(frame).toContain('github.com-pepsi')
        expect(frame).toContain('✓ SSH key (~/.ssh/id_ed25519_pepsi)')
        expect(frame).toContain('✓ Working directory (~/code/pepsi)')
        expect(frame).toContain('✓ Git identity (Jane Doe <jane@example.com>)')
    })

    it('should flag a Git identity mismatch and a failed probe', async () => {

        const pepsi = deriveIdentity('pepsi', env.paths, env.settings)

        env.fakes.gitReader.users.set(pepsi.codeDirectory, { name: 'Other', email: 'other@example.com' })
        await addPepsi()
        env.fakes.probe.outcome = { ok: false, detail: 'Permission denied (publickey).' }

        const { lastFrame } = renderScreen(<EnvListScreen params={{}} />, env, { initialRoute: 'env/list' })

        const frame = await waitForText(lastFrame, 'SSH failed')

        expect(frame).toContain('Git identity mismatch')
        expect(frame).toContain('✗ SSH failed (Permission denied (publickey).)')
    })

    it('should return to the menu on any key once loaded', async () => {

        const { stdin, lastFrame } = renderScreen(<EnvListScreen params={{}} />, env, { initialRoute: 'env/list' })

        await waitForText(lastFrame, 'No environments found')
        await tick()
        stdin.write('q')
        await tick()

        expect(lastFrame()).toContain('route:home')
    })
})
