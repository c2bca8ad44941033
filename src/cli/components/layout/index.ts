/**
 * Layout components.
 */
export { Panel } from './Panel.js'

export type { PanelProps, PanelTone } from './Panel.js'
