/**
 * Exit screen - says goodbye, then shuts down.
 */
import { useEffect } from 'react';
import type { ReactElement } from 'react';
import { Box, Text } from 'ink';

import type { ScreenProps } from '../types.js';
import { useShutdown } from '../shutdown.js';

/** How long "Goodbye" stays on screen */
export const EXIT_DELAY_MS = 300;

export function ExitScreen({ params: _params }: ScreenProps): ReactElement {

    const { gracefulExit } = useShutdown();

    useEffect(() => {

        const timer = setTimeout(() => {

            void gracefulExit('user');

        }, EXIT_DELAY_MS);

        return () => clearTimeout(timer);

    }, [gracefulExit]);

    return (
        <Box padding={1}>
            <Text color="cyan">Goodbye</Text>
        </Box>
    );

}
