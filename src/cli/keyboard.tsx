/**
 * Keys that work everywhere, and input scoped to the focused component.
 */
import { useInput } from 'ink';
import type { ReactNode, ReactElement } from 'react';

import { useShutdown } from './shutdown.js';

type InputHandler = Parameters<typeof useInput>[0];

/**
 * Turns Ctrl+C into a graceful exit, so the log file is flushed before Ink
 * unmounts. Ink's own exitOnCtrlC is turned off in the entry point.
 */
export function GlobalKeyboard({ children }: { children: ReactNode }): ReactElement {

    const { gracefulExit } = useShutdown();

    useInput((input, key) => {

        if (key.ctrl && input === 'c') void gracefulExit('interrupt');

    });

    return <>{children}</>;

}

/**
 * `useInput` that only listens while `isFocused`.
 *
 * @example
 * ```typescript
 * const { isFocused } = useFocusScope('ResetResult')
 *
 * useFocusedInput(isFocused, () => reset())
 * ```
 */
export function useFocusedInput(isFocused: boolean, handler: InputHandler): void {

    useInput(handler, { isActive: isFocused });

}
