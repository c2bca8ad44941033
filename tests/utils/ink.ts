/**
 * Helpers for driving Ink components through ink-testing-library.
 */
import { tick } from './fakes.js'


/**
 * Raw sequences a terminal sends for special keys.
 */
export const KEYS = {
    enter: '\r',
    escape: '\u001B',
    tab: '\t',
    up: '\u001B[A',
    down: '\u001B[B',
    left: '\u001B[D',
    right: '\u001B[C',
} as const


/**
 * Poll until the last frame contains `text`, or give up after `timeoutMs`.
 *
 * @returns the last frame seen
 */
export async function waitForText(
    lastFrame: () => string | undefined,
    text: string,
    timeoutMs = 2000,
): Promise<string> {

    const deadline = Date.now() + timeoutMs

    while (Date.now() < deadline) {

        const frame = lastFrame() ?? ''

        if (frame.includes(text)) return frame

        await tick(10)
    }

    return lastFrame() ?? ''
}
