import { describe, it, expect } from 'vitest'

import { SystemClipboard } from '../../../src/core/process/clipboard.js'
import { SystemBrowser } from '../../../src/core/process/browser.js'
import { CommandSpawnError } from '../../../src/core/process/runner.js'
import { FakeRunner } from '../../utils/fakes.js'


describe('process: clipboard', () => {

    it('should pipe text into pbcopy on macOS', async () => {

        const runner = new FakeRunner()

        expect(await new SystemClipboard(runner, 'darwin').copy('ssh-ed25519 AAAA')).toBe(true)
        expect(runner.calls).toEqual([{
            command: 'pbcopy',
            args: [],
            options: { input: 'ssh-ed25519 AAAA', timeoutMs: 5000 },
        }])
    })

    it('should try each Linux utility until one works', async () => {

        const runner = new FakeRunner()
            .reply('xclip', new CommandSpawnError('xclip', 'ENOENT'))
            .reply('xsel', { code: 1, stdout: '', stderr: 'no display' })

        expect(await new SystemClipboard(runner, 'linux').copy('key')).toBe(true)
        expect(runner.commands()).toEqual(['xclip', 'xsel', 'wl-copy'])
    })

    it('should return false when nothing works', async () => {

        const runner = new FakeRunner().reply('clip', { code: 1, stdout: '', stderr: '' })

        expect(await new SystemClipboard(runner, 'win32').copy('key')).toBe(false)
        expect(await new SystemClipboard(runner, 'aix').copy('key')).toBe(false)
    })
})


describe('process: browser', () => {

    it('should use the platform opener', async () => {

        const runner = new FakeRunner()
        const url = 'https://github.com/settings/keys'

        await new SystemBrowser(runner, 'darwin').open(url)
        await new SystemBrowser(runner, 'linux').open(url)
        await new SystemBrowser(runner, 'win32').open(url)

        expect(runner.calls.map((call) => [call.command, ...call.args])).toEqual([
            ['open', url],
            ['xdg-open', url],
            ['cmd', '/c', 'start', '""', url],
        ])
    })

    it('should report failure', async () => {

        const runner = new FakeRunner().reply('xdg-open', { code: 3, stdout: '', stderr: '' })

        expect(await new SystemBrowser(runner, 'linux').open('https://example.com')).toBe(false)
    })
})
