/**
 * Confirm - yes/no question over the current screen.
 *
 * `y` and `n` answer directly; Tab or the arrows move between the choices
 * and Enter takes the highlighted one; Esc answers no. Danger dialogs
 * start on "No" so a stray Enter never deletes anything.
 *
 * @example
 * ```tsx
 * <Confirm
 *     title="Reset SSH"
 *     message="Delete every gitenv key and the SSH client config?"
 *     variant="danger"
 *     onConfirm={run}
 *     onCancel={reset}
 * />
 * ```
 */
import { useState } from 'react';
import { Box, Text } from 'ink';

import type { ReactElement, ReactNode } from 'react';

import { useFocusScope } from '../../focus.js';
import { useFocusedInput } from '../../keyboard.js';
import { Panel } from '../layout/Panel.js';
import type { PanelTone } from '../layout/Panel.js';

export type ConfirmVariant = 'default' | 'danger' | 'warning';

export interface ConfirmProps {
    message: string;

    title?: string;

    onConfirm: () => void;

    onCancel: () => void;

    variant?: ConfirmVariant;

    /** Lines between the message and the choices */
    children?: ReactNode;

    focusLabel?: string;
}

const TONE: Record<ConfirmVariant, PanelTone> = {
    default: 'info',
    danger: 'danger',
    warning: 'warning',
};

function Choice({ label, selected, color }: { label: string; selected: boolean; color: string }): ReactElement {

    return (
        <Text color={selected ? color : undefined} bold={selected}>
            {selected ? '❯ ' : '  '}
            {label}
        </Text>
    );

}

export function Confirm({
    message,
    title = 'Confirm',
    onConfirm,
    onCancel,
    variant = 'default',
    children,
    focusLabel = 'Confirm',
}: ConfirmProps): ReactElement {

    const { isFocused } = useFocusScope(focusLabel);
    const [yes, setYes] = useState(variant !== 'danger');

    useFocusedInput(isFocused, (input, key) => {

        const answer = input.toLowerCase();

        if (answer === 'y' || (key.return && yes)) {

            onConfirm();

            return;

        }

        if (answer === 'n' || key.escape || key.return) {

            onCancel();

            return;

        }

        if (key.tab || key.leftArrow || key.rightArrow) setYes((current) => !current);

    });

    return (
        <Panel title={title} tone={TONE[variant]} roomy>
            <Box flexDirection="column" gap={1}>
                <Text>{message}</Text>

                {children}

                <Box gap={2}>
                    <Choice label="Yes (y)" selected={yes} color="green" />
                    <Choice label="No (n)" selected={!yes} color="red" />
                </Box>
            </Box>
        </Panel>
    );

}
