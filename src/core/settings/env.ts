/**
 * Environment variable overrides.
 *
 * A handful of GITENV_* variables override settings.yml. They exist so a
 * shell profile or a test harness can relocate every file gitenv touches
 * without writing a settings file.
 *
 * @example
 * ```bash
 * GITENV_SSH_DIR=/tmp/ssh GITENV_CODE_DIR=/tmp/code gitenv
 * ```
 */
import { parseSettings } from './schema.js';
import type { Settings } from './types.js';


/**
 * Env var → settings field it overrides.
 */
const ENV_OVERRIDES = {
    GITENV_SSH_DIR: ['paths', 'sshDir'],
    GITENV_SSH_CONFIG: ['paths', 'sshConfig'],
    GITENV_GIT_CONFIG: ['paths', 'gitConfig'],
    GITENV_FRAGMENT_DIR: ['paths', 'fragmentDir'],
    GITENV_CODE_DIR: ['paths', 'codeDir'],
    GITENV_LOG_LEVEL: ['logging', 'level'],
} as const;


/**
 * Apply GITENV_* overrides on top of parsed settings.
 *
 * Empty variables are ignored. The merged result is validated again, so an
 * invalid override (e.g. `GITENV_LOG_LEVEL=loud`) raises
 * SettingsValidationError just like an invalid file would.
 */
export function applyEnvOverrides(settings: Settings, env: NodeJS.ProcessEnv = process.env): Settings {

    const merged = {
        ...settings,
        paths: { ...settings.paths },
        logging: { ...settings.logging },
    };

    let changed = false;

    for (const [envVar, [section, key]] of Object.entries(ENV_OVERRIDES)) {

        const value = env[envVar];

        if (!value) continue;

        const target: Record<string, unknown> = merged[section];
        target[key] = value;
        changed = true;

    }

    return changed ? parseSettings(merged) : settings;

}


/**
 * Names of the supported override variables.
 */
export function listEnvOverrides(): string[] {

    return Object.keys(ENV_OVERRIDES);

}
