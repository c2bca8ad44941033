/**
 * Environment screens.
 */
export { EnvAddScreen } from './EnvAddScreen.js'
export { EnvListScreen } from './EnvListScreen.js'
