import type { ReactElement } from 'react';
import { Text } from 'ink';

import type { ScreenProps } from '../types.js';
import { useRouter } from '../router.js';
import { useFocusScope } from '../focus.js';
import { useFocusedInput } from '../keyboard.js';
import { Panel } from '../components/index.js';

/**
 * Fallback for a route with no registered screen. Any key goes back to the menu.
 */
export function NotFoundScreen(_props: ScreenProps): ReactElement {

    const { route, reset } = useRouter();
    const { isFocused } = useFocusScope('NotFound');

    useFocusedInput(isFocused, reset);

    return (
        <Panel title="Unknown screen" tone="danger" footer="Press any key to return to the menu">
            <Text>Nothing is registered for <Text color="yellow">{route}</Text>.</Text>
        </Panel>
    );

}
