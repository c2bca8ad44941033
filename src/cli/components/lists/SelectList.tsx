/**
 * SelectList component - navigable list with selection callback.
 *
 * Arrow keys move the highlight, Enter selects it. Items may carry a
 * hotkey that selects them directly. Printable keys that match nothing are
 * passed to `onUnhandledInput`, which is how the home menu reports an
 * invalid option.
 *
 * @example
 * ```tsx
 * <SelectList
 *     items={[
 *         { key: 'add', label: 'Add environment', value: 'env/add', hotkey: '3' },
 *     ]}
 *     onSelect={(item) => navigate(item.value)}
 *     onUnhandledInput={(input) => setError(`Invalid option: ${input}`)}
 * />
 * ```
 */
import { useState, useRef } from 'react';
import { Box, Text, useInput } from 'ink';

import type { ReactElement } from 'react';

import { useFocusScope } from '../../focus.js';

export interface SelectListItem<T> {
    /** Unique identifier */
    key: string;

    label: string;

    /** Payload passed on select */
    value: T;

    /** Dimmed text after the label */
    description?: string;

    /** Single character that selects this item */
    hotkey?: string;
}

export interface SelectListProps<T> {
    items: SelectListItem<T>[];

    onSelect: (item: SelectListItem<T>) => void;

    /** Printable input that is neither navigation nor a hotkey */
    onUnhandledInput?: (input: string) => void;

    /** Escape pressed */
    onCancel?: () => void;

    /** Focus scope label */
    focusLabel?: string;
}

export function SelectList<T>({
    items,
    onSelect,
    onUnhandledInput,
    onCancel,
    focusLabel = 'SelectList',
}: SelectListProps<T>): ReactElement {

    const { isFocused } = useFocusScope(focusLabel);
    const [highlightedIndex, setHighlightedIndex] = useState(0);

    // Handlers read the latest items through a ref
    const itemsRef = useRef(items);
    itemsRef.current = items;

    useInput((input, key) => {

        if (!isFocused) return;

        const current = itemsRef.current;

        if (key.escape) {

            onCancel?.();

            return;

        }

        if (key.upArrow) {

            setHighlightedIndex((i) => (i > 0 ? i - 1 : current.length - 1));

            return;

        }

        if (key.downArrow) {

            setHighlightedIndex((i) => (i < current.length - 1 ? i + 1 : 0));

            return;

        }

        if (key.return) {

            const item = current[highlightedIndex];

            if (item) onSelect(item);

            return;

        }

        if (!input || key.ctrl || key.meta) return;

        const byHotkey = current.find((item) => item.hotkey === input);

        if (byHotkey) {

            onSelect(byHotkey);

            return;

        }

        onUnhandledInput?.(input);

    });

    if (items.length === 0) {

        return <Text dimColor>No items</Text>;

    }

    return (
        <Box flexDirection="column">
            {items.map((item, index) => {

                const isHighlighted = index === highlightedIndex;

                return (
                    <Box key={item.key}>
                        {item.hotkey && <Text dimColor>{item.hotkey} </Text>}
                        <Text
                            color={isHighlighted && isFocused ? 'cyan' : undefined}
                            bold={isHighlighted && isFocused}
                        >
                            {isHighlighted ? '❯ ' : '  '}
                            {item.label}
                            {item.description && <Text dimColor> {item.description}</Text>}
                        </Text>
                    </Box>
                );

            })}
        </Box>
    );

}
