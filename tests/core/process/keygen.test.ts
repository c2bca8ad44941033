import { describe, it, expect } from 'vitest'

import { KeyGenerationError, SshKeyGenerator } from '../../../src/core/process/keygen.js'
import { CommandSpawnError } from '../../../src/core/process/runner.js'
import { FakeRunner } from '../../utils/fakes.js'


describe('process: keygen', () => {

    it('should run ssh-keygen with an empty passphrase', async () => {

        const runner = new FakeRunner()

        await new SshKeyGenerator(runner).generate('/home/jane/.ssh/id_ed25519_pepsi', 'jane@example.com', 'ed25519')

        expect(runner.calls).toEqual([{
            command: 'ssh-keygen',
            args: ['-t', 'ed25519', '-C', 'jane@example.com', '-f', '/home/jane/.ssh/id_ed25519_pepsi', '-N', '', '-q'],
            options: {},
        }])
    })

    it('should raise with the trimmed stderr on failure', async () => {

        const runner = new FakeRunner().reply('ssh-keygen', { code: 1, stdout: '', stderr: 'Saving key failed\n' })

        await expect(new SshKeyGenerator(runner).generate('/k', 'c', 'rsa'))
            .rejects.toThrow('Failed to generate SSH key /k: Saving key failed')
    })

    it('should fall back to the exit code when stderr is empty', async () => {

        const runner = new FakeRunner().reply('ssh-keygen', { code: 2, stdout: '', stderr: '' })
        const promise = new SshKeyGenerator(runner).generate('/k', 'c', 'ecdsa')

        await expect(promise).rejects.toBeInstanceOf(KeyGenerationError)
        await expect(promise).rejects.toThrow('exit code 2')
    })

    it('should raise when ssh-keygen cannot be started', async () => {

        const runner = new FakeRunner().reply('ssh-keygen', new CommandSpawnError('ssh-keygen', 'spawn ssh-keygen ENOENT'))

        await expect(new SshKeyGenerator(runner).generate('/k', 'c', 'ed25519'))
            .rejects.toThrow('Failed to generate SSH key /k: Could not run ssh-keygen: spawn ssh-keygen ENOENT')
    })
})
