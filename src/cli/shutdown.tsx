/**
 * Leaving the TUI.
 *
 * `gracefulExit` announces `app:shutdown`, waits for the log file to flush
 * and only then unmounts Ink. Both ways out go through it: the Exit menu
 * choice and Ctrl+C.
 *
 * @example
 * ```tsx
 * const { gracefulExit } = useShutdown()
 *
 * useEffect(() => {
 *     const timer = setTimeout(() => void gracefulExit('user'), EXIT_DELAY_MS)
 *     return () => clearTimeout(timer)
 * }, [gracefulExit])
 * ```
 */
import { createContext, useContext, useCallback, useMemo, useRef, useState } from 'react';
import type { ReactNode, ReactElement } from 'react';
import { useApp, Box } from 'ink';
import { Spinner } from '@inkjs/ui';
import { attempt } from '@logosdx/utils';

import { observer, stopLogger } from '../core/index.js';

/** `user` picked Exit, `interrupt` is Ctrl+C */
export type ShutdownReason = 'user' | 'interrupt';

export interface ShutdownContextValue {
    gracefulExit: (reason: ShutdownReason) => Promise<void>;

    isShuttingDown: boolean;
}

const ShutdownContext = createContext<ShutdownContextValue | null>(null);

export function ShutdownProvider({ children }: { children: ReactNode }): ReactElement {

    const { exit } = useApp();
    const started = useRef(false);
    const [isShuttingDown, setIsShuttingDown] = useState(false);

    const gracefulExit = useCallback(async (reason: ShutdownReason) => {

        if (started.current) return;

        started.current = true;
        setIsShuttingDown(true);

        observer.emit('app:shutdown', { reason });

        const [, err] = await attempt(() => stopLogger());

        if (err) {

            console.error(`gitenv: could not flush the log file: ${err.message}`);

        }

        exit();

    }, [exit]);

    const value = useMemo(() => ({ gracefulExit, isShuttingDown }), [gracefulExit, isShuttingDown]);

    // Nothing else redraws while the log flushes
    return (
        <ShutdownContext.Provider value={value}>
            {isShuttingDown
                ? (
                    <Box padding={1}>
                        <Spinner label="Shutting down..." />
                    </Box>
                )
                : children}
        </ShutdownContext.Provider>
    );

}

/**
 * Must be used within a ShutdownProvider.
 */
export function useShutdown(): ShutdownContextValue {

    const context = useContext(ShutdownContext);

    if (!context) {

        throw new Error('useShutdown must be used within a ShutdownProvider');

    }

    return context;

}
