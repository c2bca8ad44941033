import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, mkdir, readFile, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

import { SettingsManager } from '../../../src/core/settings/manager.js'
import { SettingsValidationError } from '../../../src/core/settings/schema.js'
import { observer } from '../../../src/core/observer.js'


describe('settings: manager', () => {

    let home: string
    let settingsDir: string

    beforeEach(async () => {

        home = await mkdtemp(join(tmpdir(), 'gitenv-settings-'))
        settingsDir = join(home, '.gitenv')
    })

    afterEach(async () => {

        await rm(home, { recursive: true, force: true })
    })

    function createManager(env: NodeJS.ProcessEnv = {}): SettingsManager {

        return new SettingsManager({ homeDir: home, env })
    }

    async function writeSettings(content: string): Promise<void> {

        await mkdir(settingsDir, { recursive: true })
        await writeFile(join(settingsDir, 'settings.yml'), content)
    }

    describe('paths', () => {

        it('should default to ~/.gitenv/settings.yml', () => {

            const manager = createManager()

            expect(manager.settingsDirPath).toBe(settingsDir)
            expect(manager.settingsFilePath).toBe(join(settingsDir, 'settings.yml'))
        })

        it('should honour GITENV_HOME', () => {

            const manager = createManager({ GITENV_HOME: '/srv/gitenv' })

            expect(manager.settingsDirPath).toBe('/srv/gitenv')
        })
    })

    describe('load', () => {

        it('should use defaults when no settings file exists', async () => {

            const manager = createManager()
            const settings = await manager.load()

            expect(settings.host.hostname).toBe('github.com')
            expect(settings.naming.keyPrefix).toBe('id_ed25519_')
            expect(settings.reset.confirm).toBe(true)
            expect(manager.paths.sshDir).toBe(join(home, '.ssh'))
            expect(manager.paths.sshConfig).toBe(join(home, '.ssh', 'config'))
            expect(manager.paths.codeDir).toBe(join(home, 'code'))
            expect(manager.paths.fragmentDir).toBe(home)
        })

        it('should read values from settings.yml', async () => {

            await writeSettings([
                'paths:',
                '    codeDir: ~/src',
                'host:',
                '    hostname: gitlab.com',
                '',
            ].join('\n'))

            const manager = createManager()
            const settings = await manager.load()

            expect(settings.host.hostname).toBe('gitlab.com')
            expect(settings.host.user).toBe('git')
            expect(manager.paths.codeDir).toBe(join(home, 'src'))
        })

        it('should treat an empty file as defaults', async () => {

            await writeSettings('')

            const settings = await createManager().load()

            expect(settings.logging.level).toBe('info')
        })

        it('should reject invalid YAML', async () => {

            await writeSettings('paths: [unclosed')

            await expect(createManager().load()).rejects.toThrow('Invalid YAML in settings file')
        })

        it('should reject values that fail validation', async () => {

            await writeSettings('logging:\n    level: loud\n')

            await expect(createManager().load()).rejects.toBeInstanceOf(SettingsValidationError)
        })

        it('should apply GITENV_* overrides over the file', async () => {

            await writeSettings('paths:\n    codeDir: ~/src\n')

            const manager = createManager({ GITENV_CODE_DIR: '/work/code' })

            await manager.load()

            expect(manager.paths.codeDir).toBe('/work/code')
        })

        it('should emit settings:loaded', async () => {

            const events: Array<{ path: string; fromFile: boolean }> = []
            const cleanup = observer.on('settings:loaded', (data) => events.push(data))

            const manager = createManager()

            await manager.load()
            cleanup()

            expect(events).toEqual([{ path: manager.settingsFilePath, fromFile: false }])
        })
    })

    describe('accessors', () => {

        it('should throw before load', () => {

            const manager = createManager()

            expect(manager.isLoaded).toBe(false)
            expect(() => manager.settings).toThrow('Settings not loaded')
            expect(() => manager.paths).toThrow('Settings not loaded')
        })
    })

    describe('init', () => {

        it('should write a settings file that loads back to the defaults', async () => {

            const manager = createManager()

            await manager.init()

            const content = await readFile(manager.settingsFilePath, 'utf-8')

            expect(content).toContain('hostname: github.com')

            const settings = await createManager().load()

            expect(settings.paths.sshDir).toBe('~/.ssh')
        })

        it('should refuse to overwrite without force', async () => {

            await writeSettings('host:\n    hostname: gitlab.com\n')

            const manager = createManager()

            await expect(manager.init()).rejects.toThrow('Settings file already exists')
            await expect(manager.init(true)).resolves.toBeUndefined()

            const settings = await manager.load()

            expect(settings.host.hostname).toBe('github.com')
        })
    })
})
