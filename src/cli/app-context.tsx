/**
 * App Context - hands the loaded environment context to screens.
 *
 * Settings are loaded and the context is built before Ink renders, so
 * screens never see a half-initialized app. This layer holds no logic of
 * its own; operations live in core.
 *
 * @example
 * ```tsx
 * function ListScreen() {
 *     const { ctx } = useAppContext()
 *     // listEnvironments(ctx) ...
 * }
 * ```
 */
import { createContext, useContext, useMemo } from 'react';
import type { ReactNode, ReactElement } from 'react';

import type { EnvContext } from '../core/index.js';

/**
 * Context value.
 */
export interface AppContextValue {
    /** Settings, paths, store and adapters for core operations */
    ctx: EnvContext;

    /** Settings file the context was loaded from (shown in the status bar) */
    settingsFile: string;
}

const AppContext = createContext<AppContextValue | null>(null);

export interface AppContextProviderProps {
    ctx: EnvContext;
    settingsFile: string;
    children: ReactNode;
}

export function AppContextProvider({ ctx, settingsFile, children }: AppContextProviderProps): ReactElement {

    const value = useMemo<AppContextValue>(() => ({ ctx, settingsFile }), [ctx, settingsFile]);

    return <AppContext.Provider value={value}>{children}</AppContext.Provider>;

}

/**
 * Hook to access the app context.
 *
 * Must be used within an AppContextProvider.
 */
export function useAppContext(): AppContextValue {

    const context = useContext(AppContext);

    if (!context) {

        throw new Error('useAppContext must be used within an AppContextProvider');

    }

    return context;

}
