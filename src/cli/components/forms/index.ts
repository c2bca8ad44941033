/**
 * Form components.
 */
export { Form, validateForm } from './Form.js'

export type { FormProps, FormField, FormValues, FormErrors } from './Form.js'
