/**
 * Text fields with validation.
 *
 * Tab and the arrow keys move between fields. Enter submits once every
 * field validates, otherwise the cursor jumps to the first bad field.
 * Esc empties the current field, and cancels when it is already empty.
 *
 * @example
 * ```tsx
 * <Form
 *     fields={[
 *         { key: 'id', label: 'Identity id', required: true },
 *         { key: 'name', label: 'Git user name', required: true },
 *     ]}
 *     onSubmit={(values) => start(values)}
 *     onCancel={reset}
 * />
 * ```
 */
import { useMemo, useReducer } from 'react'
import { Box, Text } from 'ink'
import { TextInput } from '@inkjs/ui'

import type { ReactElement } from 'react'

import { useFocusScope } from '../../focus.js'
import { useFocusedInput } from '../../keyboard.js'


export interface FormField {

    key: string
    label: string
    required?: boolean
    defaultValue?: string
    placeholder?: string

    /** Message for a bad value, undefined for a good one */
    validate?: (value: string) => string | undefined
}


export type FormValues = Record<string, string>

export type FormErrors = Record<string, string>


export interface FormProps {

    fields: FormField[]

    /** Receives trimmed values */
    onSubmit: (values: FormValues) => void

    onCancel?: () => void
    submitLabel?: string
    focusLabel?: string
}


/**
 * Check every field against its trimmed value.
 */
export function validateForm(fields: FormField[], values: FormValues): FormErrors {

    const errors: FormErrors = {}

    for (const field of fields) {

        const value = (values[field.key] ?? '').trim()
        const error = field.required && value === ''
            ? 'Required'
            : field.validate?.(value)

        if (error) errors[field.key] = error
    }

    return errors
}


interface FormState {

    values: FormValues
    errors: FormErrors
    active: number

    /** Bumped to remount the inputs, which is how a TextInput gets emptied */
    epoch: number
}

type FormAction =
    | { type: 'edit'; key: string; value: string }
    | { type: 'clear'; key: string }
    | { type: 'move'; by: number; count: number }
    | { type: 'reject'; errors: FormErrors; at: number }


function withoutError(errors: FormErrors, key: string): FormErrors {

    if (!(key in errors)) return errors

    const { [key]: _dropped, ...rest } = errors

    return rest
}


function formReducer(state: FormState, action: FormAction): FormState {

    switch (action.type) {

        case 'edit':
            return {
                ...state,
                values: { ...state.values, [action.key]: action.value },
                errors: withoutError(state.errors, action.key),
            }

        case 'clear':
            return {
                ...state,
                values: { ...state.values, [action.key]: '' },
                errors: withoutError(state.errors, action.key),
                epoch: state.epoch + 1,
            }

        case 'move':
            return { ...state, active: (state.active + action.by + action.count) % action.count }

        case 'reject':
            return { ...state, errors: action.errors, active: action.at }
    }
}


export function Form({
    fields,
    onSubmit,
    onCancel,
    submitLabel = 'Submit',
    focusLabel = 'Form',
}: FormProps): ReactElement {

    const { isFocused } = useFocusScope(focusLabel)

    const [state, dispatch] = useReducer(formReducer, fields, (initial): FormState => ({
        values: Object.fromEntries(initial.map((field) => [field.key, field.defaultValue ?? ''])),
        errors: {},
        active: 0,
        epoch: 0,
    }))

    // Stable per field, so typing in one input leaves the others alone
    const onChange = useMemo(() => Object.fromEntries(
        fields.map((field) => [field.key, (value: string) => dispatch({ type: 'edit', key: field.key, value })]),
    ), [fields])

    const submit = (): void => {

        const errors = validateForm(fields, state.values)
        const at = fields.findIndex((field) => field.key in errors)

        if (at >= 0) {

            dispatch({ type: 'reject', errors, at })

            return
        }

        onSubmit(Object.fromEntries(
            fields.map((field) => [field.key, (state.values[field.key] ?? '').trim()]),
        ))
    }

    const escape = (): void => {

        const current = fields[state.active]

        if (current && state.values[current.key]) {

            dispatch({ type: 'clear', key: current.key })

            return
        }

        onCancel?.()
    }

    useFocusedInput(isFocused, (_input, key) => {

        if (key.tab || key.downArrow) dispatch({ type: 'move', by: 1, count: fields.length })
        else if (key.upArrow) dispatch({ type: 'move', by: -1, count: fields.length })
        else if (key.return) submit()
        else if (key.escape) escape()
    })

    return (
        <Box flexDirection="column" gap={1}>
            {fields.map((field, index) => (
                <FieldRow
                    key={`${field.key}-${state.epoch}`}
                    field={field}
                    value={state.values[field.key] ?? ''}
                    error={state.errors[field.key]}
                    editing={isFocused && index === state.active}
                    onChange={onChange[field.key] ?? (() => undefined)}
                />
            ))}

            <Text dimColor>
                [Enter] {submitLabel}   [Esc] Cancel   [Tab/↑↓] Field
            </Text>
        </Box>
    )
}


interface FieldRowProps {

    field: FormField
    value: string
    error: string | undefined
    editing: boolean
    onChange: (value: string) => void
}


function FieldRow({ field, value, error, editing, onChange }: FieldRowProps): ReactElement {

    return (
        <Box flexDirection="column">
            <Text color={editing ? 'cyan' : undefined} bold={editing}>
                {editing ? '› ' : '  '}{field.label}{field.required ? <Text color="red"> *</Text> : null}
            </Text>

            <Box paddingLeft={2}>
                <TextInput
                    placeholder={field.placeholder ?? ''}
                    defaultValue={value}
                    onChange={onChange}
                    isDisabled={!editing}
                />
            </Box>

            {error ? <Box paddingLeft={2}><Text color="red">{error}</Text></Box> : null}
        </Box>
    )
}
