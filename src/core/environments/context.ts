/**
 * Shared context handed to every environment operation.
 */
import { IdentityStore } from '../store/store.js'
import { createAdapters } from '../process/index.js'

import type { Settings, WorkspacePaths } from '../settings/types.js'
import type { Adapters } from '../process/index.js'


/**
 * Settings, resolved paths, the store and the external adapters.
 *
 * The CLI builds one from SettingsManager; tests build one over a temp
 * directory with fake adapters.
 */
export interface EnvContext {

    settings: Settings
    paths: WorkspacePaths
    store: IdentityStore
    adapters: Adapters
}


/**
 * Build a context over real adapters unless some are supplied.
 *
 * @example
 * ```typescript
 * await manager.load()
 *
 * const ctx = createEnvContext(manager.settings, manager.paths)
 * ```
 */
export function createEnvContext(
    settings: Settings,
    paths: WorkspacePaths,
    adapters: Partial<Adapters> = {},
): EnvContext {

    return {
        settings,
        paths,
        store: new IdentityStore(paths, settings),
        adapters: { ...createAdapters(settings, paths), ...adapters },
    }
}
