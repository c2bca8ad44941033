/**
 * Layout components tests.
 */
import { describe, it, expect } from 'vitest'
import { render } from 'ink-testing-library'
import { Text } from 'ink'

import { Panel } from '../../../src/cli/components/layout/index.js'


describe('cli: components/layout', () => {

    describe('Panel', () => {

        it('should render title, content and footer', () => {

            const { lastFrame } = render(
                <Panel title="work" footer="[Esc] Back">
                    <Text>SSH authenticated</Text>
                </Panel>
            )

            const frame = lastFrame() ?? ''

            expect(frame).toContain('work')
            expect(frame).toContain('SSH authenticated')
            expect(frame).toContain('[Esc] Back')
        })

        it('should draw a rounded border', () => {

            const { lastFrame } = render(
                <Panel>
                    <Text>body</Text>
                </Panel>
            )

            expect(lastFrame()).toContain('╭')
            expect(lastFrame()).toContain('╯')
        })
    })
})
