/**
 * Home screen - the numbered main menu.
 *
 * Every operation starts here and every screen returns here when done.
 * Digits select directly; arrows and Enter work too. Any other printable
 * key is reported as an invalid option and the menu stays up.
 */
import { useState } from 'react';
import type { ReactElement } from 'react';
import { Box, Text } from 'ink';

import type { Route, ScreenProps } from '../types.js';
import { useRouter } from '../router.js';
import { Panel, SelectList } from '../components/index.js';
import type { SelectListItem } from '../components/index.js';

export const MENU_ITEMS: SelectListItem<Route>[] = [
    { key: 'reset-ssh', hotkey: '1', label: 'Reset SSH', value: 'reset/ssh', description: 'delete gitenv keys and the SSH config' },
    { key: 'reset-git', hotkey: '2', label: 'Reset Git', value: 'reset/git', description: 'delete the Git config and identity fragments' },
    { key: 'add', hotkey: '3', label: 'Add environment', value: 'env/add', description: 'new key, SSH alias and Git identity' },
    { key: 'list', hotkey: '4', label: 'List & verify', value: 'env/list', description: 'check every environment' },
    { key: 'exit', hotkey: '5', label: 'Exit', value: 'exit' },
];

export function HomeScreen({ params: _params }: ScreenProps): ReactElement {

    const { navigate } = useRouter();
    const [invalid, setInvalid] = useState<string | null>(null);

    return (
        <Box flexDirection="column" gap={1}>
            <Panel title="gitenv" footer="[1-5] select  [↑↓] move  [Enter] choose">
                <SelectList
                    items={MENU_ITEMS}
                    focusLabel="HomeMenu"
                    onSelect={(item) => {

                        setInvalid(null);
                        navigate(item.value);

                    }}
                    onUnhandledInput={(input) => setInvalid(input)}
                />
            </Panel>

            {invalid !== null && <Text color="red">Invalid option: {invalid}</Text>}
        </Box>
    );

}
