/**
 * Root component of the gitenv TUI.
 *
 * Shutdown wraps everything so Ctrl+C works on every screen. Inside it the
 * loaded context, focus and the router, then the frame: where you are on
 * top, the screen, and the git host and settings file underneath.
 */
import type { ReactElement } from 'react';
import { Box, Text, Spacer } from 'ink';

import type { Route, RouteParams } from './types.js';
import type { EnvContext } from '../core/index.js';
import { toHomeRelative } from '../core/index.js';
import { RouterProvider, useRouter } from './router.js';
import { FocusProvider } from './focus.js';
import { GlobalKeyboard } from './keyboard.js';
import { ScreenRenderer, getRouteLabel } from './screens.js';
import { AppContextProvider, useAppContext } from './app-context.js';
import { ShutdownProvider } from './shutdown.js';

const RULE = { borderStyle: 'single', borderColor: 'gray', borderLeft: false, borderRight: false } as const;

function Header(): ReactElement {

    const { route } = useRouter();

    return (
        <Box {...RULE} borderTop={false} paddingX={1}>
            <Text bold>gitenv</Text>
            {route === 'home' ? null : <Text><Text dimColor> › </Text>{getRouteLabel(route)}</Text>}
        </Box>
    );

}

function Footer(): ReactElement {

    const { ctx, settingsFile } = useAppContext();
    const { settings, paths } = ctx;

    return (
        <Box {...RULE} borderBottom={false} paddingX={1}>
            <Text color="cyan">{settings.host.hostname}</Text>
            <Text dimColor>  {toHomeRelative(paths.codeDir, paths.homeDir)}</Text>
            <Spacer />
            <Text dimColor>{toHomeRelative(settingsFile, paths.homeDir)}</Text>
        </Box>
    );

}

export interface AppProps {
    ctx: EnvContext;

    /** Where ctx.settings came from, shown in the footer */
    settingsFile: string;

    initialRoute?: Route;
    initialParams?: RouteParams;
}

/**
 * @example
 * ```tsx
 * render(<App ctx={createEnvContext(manager.settings, manager.paths)} settingsFile={manager.settingsFilePath} />)
 * ```
 */
export function App({ ctx, settingsFile, initialRoute = 'home', initialParams = {} }: AppProps): ReactElement {

    return (
        <ShutdownProvider>
            <AppContextProvider ctx={ctx} settingsFile={settingsFile}>
                <FocusProvider>
                    <RouterProvider initialRoute={initialRoute} initialParams={initialParams}>
                        <GlobalKeyboard>
                            <Box flexDirection="column">
                                <Header />
                                <ScreenRenderer />
                                <Footer />
                            </Box>
                        </GlobalKeyboard>
                    </RouterProvider>
                </FocusProvider>
            </AppContextProvider>
        </ShutdownProvider>
    );

}
