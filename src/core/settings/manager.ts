/**
 * ~/.gitenv/settings.yml. A missing file is not an error: defaults apply.
 * GITENV_* overrides are layered on top of whatever the file says.
 */
import { readFile, writeFile, mkdir, access } from 'node:fs/promises'
import { homedir } from 'node:os'
import { join } from 'node:path'
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml'
import { attempt, attemptSync } from '@logosdx/utils'

import { observer } from '../observer.js'
import { parseSettings } from './schema.js'
import { applyEnvOverrides } from './env.js'
import { resolvePaths } from './paths.js'
import { SETTINGS_FILE_NAME, createDefaultSettings, getSettingsDir } from './defaults.js'

import type { Settings, WorkspacePaths } from './types.js'


export interface SettingsManagerOptions {

    /** Home directory (default: os.homedir()) */
    homeDir?: string

    /** Override settings directory (default: GITENV_HOME or ~/.gitenv) */
    settingsDir?: string

    /** Override settings file name (default: settings.yml) */
    settingsFile?: string

    /** Environment consulted for GITENV_* overrides (default: process.env) */
    env?: NodeJS.ProcessEnv
}


interface Loaded {

    settings: Settings
    paths: WorkspacePaths
}


/**
 * Reads settings.yml once and resolves the directories gitenv works in.
 *
 * @example
 * ```typescript
 * const manager = new SettingsManager()
 * await manager.load()
 *
 * const { sshDir, codeDir } = manager.paths
 * ```
 */
export class SettingsManager {

    readonly #homeDir: string
    readonly #env: NodeJS.ProcessEnv
    readonly #dir: string
    readonly #file: string
    #loaded: Loaded | null = null

    constructor(options: SettingsManagerOptions = {}) {

        this.#homeDir = options.homeDir ?? homedir()
        this.#env = options.env ?? process.env
        this.#dir = options.settingsDir ?? getSettingsDir(this.#homeDir, this.#env)
        this.#file = join(this.#dir, options.settingsFile ?? SETTINGS_FILE_NAME)
    }

    get settingsDirPath(): string {

        return this.#dir
    }

    get settingsFilePath(): string {

        return this.#file
    }

    async exists(): Promise<boolean> {

        const [, err] = await attempt(() => access(this.#file))

        return !err
    }

    /**
     * Read the file, or take the defaults when there is none, then apply
     * GITENV_* overrides.
     *
     * @throws SettingsValidationError when a value is out of range
     */
    async load(): Promise<Settings> {

        const fromFile = await this.exists()
        const base = fromFile ? await this.#readFile() : createDefaultSettings()
        const settings = applyEnvOverrides(base, this.#env)

        this.#loaded = { settings, paths: resolvePaths(settings, this.#homeDir) }

        observer.emit('settings:loaded', { path: this.#file, fromFile })

        return settings
    }

    async #readFile(): Promise<Settings> {

        const [content, readErr] = await attempt(() => readFile(this.#file, 'utf-8'))

        if (readErr) throw new Error(`Failed to read settings file: ${readErr.message}`)

        const [parsed, yamlErr] = attemptSync((): unknown => parseYaml(content))

        if (yamlErr) throw new Error(`Invalid YAML in settings file: ${yamlErr.message}`)

        // An empty document parses to null
        return parseSettings(parsed ?? {})
    }

    /**
     * Write the defaults to settings.yml. An existing file is kept unless `force`.
     */
    async init(force = false): Promise<void> {

        if (!force && await this.exists()) {

            throw new Error(`Settings file already exists: ${this.#file}`)
        }

        const yaml = stringifyYaml(createDefaultSettings(), { indent: 4, lineWidth: 120 })

        const [, err] = await attempt(async () => {

            await mkdir(this.#dir, { recursive: true })
            await writeFile(this.#file, yaml, 'utf-8')
        })

        if (err) throw new Error(`Failed to write settings file: ${err.message}`)

        observer.emit('settings:initialized', { path: this.#file })
    }

    get isLoaded(): boolean {

        return this.#loaded !== null
    }

    get settings(): Settings {

        return this.#require().settings
    }

    get paths(): WorkspacePaths {

        return this.#require().paths
    }

    #require(): Loaded {

        if (!this.#loaded) throw new Error('Settings not loaded. Call load() first.')

        return this.#loaded
    }
}
