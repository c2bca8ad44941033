/**
 * Default Settings
 *
 * Defaults used when no settings.yml exists or when fields are missing.
 */
import { join } from 'node:path';

import { parseSettings } from './schema.js';
import type { Settings } from './types.js';

/**
 * Settings directory name under the home directory.
 */
export const SETTINGS_DIR_NAME = '.gitenv';

/**
 * Settings file name inside the settings directory.
 */
export const SETTINGS_FILE_NAME = 'settings.yml';

/**
 * Create a fresh copy of default settings.
 *
 * Built by parsing an empty document so the schema stays the single
 * source of default values.
 */
export function createDefaultSettings(): Settings {

    return parseSettings({});

}

/**
 * Resolve the settings directory.
 *
 * `GITENV_HOME` wins over `~/.gitenv`.
 */
export function getSettingsDir(homeDir: string, env: NodeJS.ProcessEnv = process.env): string {

    return env['GITENV_HOME'] || join(homeDir, SETTINGS_DIR_NAME);

}
