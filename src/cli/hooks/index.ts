/**
 * React hooks for the CLI.
 */
export { useOnEvent } from './useOnEvent.js'
