/**
 * Building blocks shared by the screens.
 */

// Layout
export { Panel } from './layout/index.js';
export type { PanelProps, PanelTone } from './layout/index.js';

// Lists
export { SelectList, StatusList } from './lists/index.js';
export type {
    SelectListProps,
    SelectListItem,
    StatusListProps,
    StatusListItem,
    StatusType,
} from './lists/index.js';

// Forms
export { Form, validateForm } from './forms/index.js';
export type { FormProps, FormField, FormValues, FormErrors } from './forms/index.js';

// Progress
export { Spinner } from '@inkjs/ui';

// Dialogs
export { Confirm } from './dialogs/index.js';
export type { ConfirmProps } from './dialogs/index.js';
