/**
 * Settings Module
 *
 * Where gitenv keeps its files and how it talks to the Git host.
 * Loaded from ~/.gitenv/settings.yml with GITENV_* overrides.
 */

// Types
export type {
    Settings,
    PathSettings,
    NamingSettings,
    HostSettings,
    SshSettings,
    LoggingSettings,
    WorkspacePaths,
} from './types.js';

// Schemas and Validation
export {
    SettingsSchema,
    LogLevelSchema,
    SettingsValidationError,
    parseSettings,
} from './schema.js';

export type { SettingsSchemaType, SettingsInput } from './schema.js';

// Defaults
export {
    SETTINGS_DIR_NAME,
    SETTINGS_FILE_NAME,
    createDefaultSettings,
    getSettingsDir,
} from './defaults.js';

// Overrides and paths
export { applyEnvOverrides, listEnvOverrides } from './env.js';
export { expandHome, toHomeRelative, resolvePaths } from './paths.js';

// Manager
export { SettingsManager } from './manager.js';

export type { SettingsManagerOptions } from './manager.js';
