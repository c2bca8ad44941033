import { useEffect, useRef, type DependencyList } from 'react'

import { observer, type GitenvEvents, type GitenvEventNames } from '../../core/index.js'


/**
 * Listen to an observer event for as long as the component is mounted.
 *
 * The listener is re-attached only when `event` or `deps` change, but it
 * always calls the handler from the latest render.
 *
 * @example
 * ```typescript
 * useOnEvent('env:warning', ({ id: from, message }) => {
 *     if (from === id) setWarnings((prev) => [...prev, message])
 * }, [id])
 * ```
 */
export function useOnEvent<E extends GitenvEventNames>(
    event: E,
    handler: (data: GitenvEvents[E]) => void,
    deps: DependencyList,
): void {

    const latest = useRef(handler)

    latest.current = handler

    useEffect(() => observer.on(event, (data) => latest.current(data)), [event, ...deps])
}
