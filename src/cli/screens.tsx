/**
 * Screen registry maps routes to React components.
 *
 * When adding a screen:
 * 1. Create the component in src/cli/screens/
 * 2. Add its route to the Route union in types.ts
 * 3. Register it here
 */
import type { ReactElement } from 'react';

import type { Route, ScreenEntry } from './types.js';
import { useRouter } from './router.js';

import { HomeScreen } from './screens/home.js';
import { NotFoundScreen } from './screens/not-found.js';
import { ExitScreen } from './screens/exit.js';
import { ResetSshScreen, ResetGitScreen } from './screens/reset/index.js';
import { EnvAddScreen, EnvListScreen } from './screens/env/index.js';

const SCREENS: Partial<Record<Route, ScreenEntry>> = {
    'home': { component: HomeScreen, label: 'Menu' },
    'reset/ssh': { component: ResetSshScreen, label: 'Reset SSH' },
    'reset/git': { component: ResetGitScreen, label: 'Reset Git' },
    'env/add': { component: EnvAddScreen, label: 'Add environment' },
    'env/list': { component: EnvListScreen, label: 'List & verify' },
    'exit': { component: ExitScreen, label: 'Exit' },
};

/**
 * Breadcrumb label for a route.
 */
export function getRouteLabel(route: Route): string {

    return SCREENS[route]?.label ?? route;

}

/**
 * Render the screen for the current route, or NotFoundScreen.
 */
export function ScreenRenderer(): ReactElement {

    const { route, params } = useRouter();

    const entry = SCREENS[route];

    if (!entry) {

        return <NotFoundScreen params={params} />;

    }

    const Screen = entry.component;

    return <Screen params={params} />;

}
