/**
 * Reset screens.
 */
export { ResetScreen, ResetSshScreen, ResetGitScreen } from './ResetScreen.js'
