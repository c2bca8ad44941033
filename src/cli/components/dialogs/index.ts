/**
 * Dialog components.
 */
export { Confirm } from './Confirm.js'

export type { ConfirmProps, ConfirmVariant } from './Confirm.js'
