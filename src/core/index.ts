/**
 * Core module exports.
 *
 * All business logic modules are exported from here.
 * CLI components should import from this barrel file.
 */

// Observer
export { observer } from './observer.js'
export type { GitenvEvents, GitenvEventNames, EnvStep, ObserverEngine } from './observer.js'

// Environment detection
export { isCi, isDebug, isMac } from './environment.js'

// Settings
export {
    SettingsManager,
    SettingsValidationError,
    parseSettings,
    createDefaultSettings,
    resolvePaths,
    expandHome,
    toHomeRelative,
} from './settings/index.js'
export type {
    Settings,
    WorkspacePaths,
    SettingsManagerOptions,
} from './settings/index.js'

// Identity
export {
    sanitizeIdentityId,
    isValidIdentityId,
    deriveIdentity,
    InvalidIdentityError,
} from './identity/index.js'
export type { GitUser, Identity } from './identity/index.js'

// Identity store
export { IdentityStore } from './store/index.js'
export type { RemoveResult, UpsertResult } from './store/index.js'

// Process adapters
export {
    createAdapters,
    ExecFileRunner,
    CommandSpawnError,
    KeyGenerationError,
    UNSET_SENTINEL,
} from './process/index.js'
export type { Adapters, CommandRunner } from './process/index.js'

// Environment operations
export {
    createEnvContext,
    resetSsh,
    resetGit,
    addEnvironment,
    listEnvironments,
    verifyGitIdentity,
    RegistrationGate,
    isAffirmative,
} from './environments/index.js'
export type {
    EnvContext,
    AddEnvironmentInput,
    AddEnvironmentHooks,
    AddEnvironmentResult,
    AddEnvironmentStatus,
    RegistrationPrompt,
    EnvironmentReport,
    GateState,
    ResetSshResult,
    ResetGitResult,
} from './environments/index.js'

// Logger
export { startLogger, stopLogger, getLogger } from './logger/index.js'
