/**
 * List components.
 */
export { SelectList } from './SelectList.js'
export { StatusList } from './StatusList.js'

export type { SelectListProps, SelectListItem } from './SelectList.js'
export type { StatusListProps, StatusListItem, StatusType } from './StatusList.js'
