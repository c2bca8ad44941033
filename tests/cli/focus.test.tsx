/**
 * Focus stack tests.
 */
import { describe, it, expect, vi } from 'vitest'
import { render } from 'ink-testing-library'
import { Text } from 'ink'

import { FocusProvider, useFocusContext, useFocusScope } from '../../src/cli/focus.js'
import { tick } from '../utils/fakes.js'


function FocusDisplay() {

    const { activeId, stack } = useFocusContext()

    return (
        <Text>
            active:{activeId === null ? 'none' : 'set'}|labels:{stack.map((entry) => entry.label ?? '?').join(',')}
        </Text>
    )
}


function Scope({ label, skip = false }: { label: string; skip?: boolean }) {

    const { isFocused } = useFocusScope({ label, skip })

    return <Text>{label}:{String(isFocused)}</Text>
}


function Screen({ dialog }: { dialog: boolean }) {

    return (
        <FocusProvider>
            <Scope label="Menu" />
            {dialog && <Scope label="Dialog" />}
            <FocusDisplay />
        </FocusProvider>
    )
}


describe('cli: focus', () => {

    it('should start with an empty stack', () => {

        const { lastFrame } = render(
            <FocusProvider>
                <FocusDisplay />
            </FocusProvider>
        )

        expect(lastFrame()).toContain('active:none|labels:')
    })

    it('should focus the only scope', async () => {

        const { lastFrame } = render(<Screen dialog={false} />)

        await tick()

        expect(lastFrame()).toContain('Menu:true')
        expect(lastFrame()).toContain('labels:Menu')
    })

    it('should hand focus to the newest scope and back on unmount', async () => {

        const { lastFrame, rerender } = render(<Screen dialog={false} />)

        await tick()
        rerender(<Screen dialog={true} />)
        await tick()

        expect(lastFrame()).toContain('Menu:false')
        expect(lastFrame()).toContain('Dialog:true')
        expect(lastFrame()).toContain('labels:Menu,Dialog')

        rerender(<Screen dialog={false} />)
        await tick()

        expect(lastFrame()).toContain('Menu:true')
        expect(lastFrame()).toContain('labels:Menu')
        expect(lastFrame()).not.toContain('Dialog')
    })

    it('should not claim focus when skipped', async () => {

        const { lastFrame } = render(
            <FocusProvider>
                <Scope label="Passive" skip />
                <FocusDisplay />
            </FocusProvider>
        )

        await tick()

        expect(lastFrame()).toContain('Passive:false')
        expect(lastFrame()).toContain('active:none')
    })

    it('should report use outside a provider', () => {

        const errors: string[] = []
        const errorSpy = vi.spyOn(console, 'error').mockImplementation((...args) => {

            errors.push(args.map(String).join(' '))
        })

        const { lastFrame } = render(<Scope label="Orphan" />)
        const output = lastFrame() ?? ''

        const reported = output.includes('useFocusContext must be used within a FocusProvider')
            || errors.some((line) => line.includes('useFocusContext must be used within a FocusProvider'))

        expect(reported).toBe(true)

        errorSpy.mockRestore()
    })
})
