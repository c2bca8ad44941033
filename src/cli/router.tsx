/**
 * Menu navigation.
 *
 * gitenv is a single loop: the menu opens a screen, the screen does its
 * work and hands control back with `reset()`. There is nothing deeper to
 * return to, so the router holds only the current route and its params.
 *
 * @example
 * ```typescript
 * const { navigate, reset } = useRouter()
 *
 * navigate('env/add', { id: 'work' })
 * reset() // back to the menu
 * ```
 */
import { createContext, useContext, useMemo, useReducer } from 'react'

import type { ReactNode, ReactElement } from 'react'

import type { Route, RouteParams, RouterContextValue } from './types.js'


interface Location {

    route: Route
    params: RouteParams
}


type NavAction =
    | { type: 'open'; route: Route; params: RouteParams }
    | { type: 'menu' }


const MENU: Location = { route: 'home', params: {} }


function locate(current: Location, action: NavAction): Location {

    switch (action.type) {

        case 'open':
            return { route: action.route, params: action.params }

        case 'menu':
            return current.route === 'home' ? current : MENU
    }
}


const RouterContext = createContext<RouterContextValue | null>(null)


export interface RouterProviderProps {

    /** Screen shown first (default: the menu) */
    initialRoute?: Route

    initialParams?: RouteParams

    children: ReactNode
}


export function RouterProvider({
    initialRoute = 'home',
    initialParams = {},
    children
}: RouterProviderProps): ReactElement {

    const [location, dispatch] = useReducer(locate, { route: initialRoute, params: initialParams })

    const value = useMemo<RouterContextValue>(() => ({
        route: location.route,
        params: location.params,
        navigate: (route, params = {}) => dispatch({ type: 'open', route, params }),
        reset: () => dispatch({ type: 'menu' }),
    }), [location])

    return (
        <RouterContext.Provider value={value}>
            {children}
        </RouterContext.Provider>
    )
}


/**
 * Current route and navigation. Must be used within a RouterProvider.
 */
export function useRouter(): RouterContextValue {

    const context = useContext(RouterContext)

    if (!context) {

        throw new Error('useRouter must be used within a RouterProvider')
    }

    return context
}
