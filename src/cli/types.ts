/**
 * Shared types of the terminal interface: menu routes, the focus stack and
 * the screen registry.
 */
import type { ReactElement } from 'react'


/**
 * Every screen the menu can open. `home` is the menu itself.
 */
export type Route =
    | 'home'
    | 'reset/ssh'
    | 'reset/git'
    | 'env/add'
    | 'env/list'
    | 'exit'


export interface RouteParams {

    /** Identity id to prefill on env/add */
    id?: string
}


export interface RouterContextValue {

    route: Route
    params: RouteParams

    /** Replace the current screen */
    navigate: (route: Route, params?: RouteParams) => void

    /** Return to the menu */
    reset: () => void
}


/**
 * One claim on the keyboard. The newest claim receives input.
 */
export interface FocusEntry {

    id: string
    label?: string
}


export interface FocusContextValue {

    /** Take the keyboard; the returned function gives it back */
    claim: (id: string, label?: string) => () => void

    /** Id holding the keyboard, null when nobody claimed it */
    activeId: string | null

    stack: FocusEntry[]
}


export interface ScreenProps {

    params: RouteParams
}


export interface ScreenEntry {

    component: (props: ScreenProps) => ReactElement

    /** Breadcrumb label */
    label: string
}
