/**
 * Keyboard ownership.
 *
 * Ink hands every keypress to every `useInput` handler. Components that
 * read keys claim a place on a stack and listen only while they are on top,
 * so a dialog opened over a screen silences the screen until it closes.
 *
 * @example
 * ```typescript
 * const { isFocused } = useFocusScope('ResetConfirm')
 *
 * useFocusedInput(isFocused, (input) => {
 *     if (input === 'y') onConfirm()
 * })
 * ```
 */
import { createContext, useContext, useState, useCallback, useMemo, useId, useEffect } from 'react';

import type { ReactNode, ReactElement } from 'react';

import type { FocusEntry, FocusContextValue } from './types.js';

const FocusContext = createContext<FocusContextValue | null>(null);

export function FocusProvider({ children }: { children: ReactNode }): ReactElement {

    const [stack, setStack] = useState<FocusEntry[]>([]);

    const claim = useCallback((id: string, label?: string) => {

        setStack((prev) => [...prev.filter((entry) => entry.id !== id), { id, label }]);

        return () => setStack((prev) => prev.filter((entry) => entry.id !== id));

    }, []);

    const value = useMemo<FocusContextValue>(
        () => ({ claim, activeId: stack.at(-1)?.id ?? null, stack }),
        [claim, stack],
    );

    return <FocusContext.Provider value={value}>{children}</FocusContext.Provider>;

}

/**
 * The focus stack. Must be used within a FocusProvider.
 */
export function useFocusContext(): FocusContextValue {

    const context = useContext(FocusContext);

    if (!context) {

        throw new Error('useFocusContext must be used within a FocusProvider');

    }

    return context;

}

export interface UseFocusScopeOptions {
    label?: string;

    /** Never claim the keyboard */
    skip?: boolean;
}

/**
 * Claim the keyboard while mounted.
 */
export function useFocusScope(labelOrOptions?: string | UseFocusScopeOptions): { isFocused: boolean } {

    const options: UseFocusScopeOptions =
        typeof labelOrOptions === 'string' ? { label: labelOrOptions } : (labelOrOptions ?? {});
    const { label, skip = false } = options;

    const { claim, activeId } = useFocusContext();
    const id = useId();

    useEffect(() => (skip ? undefined : claim(id, label)), [id, label, claim, skip]);

    return { isFocused: !skip && activeId === id };

}
