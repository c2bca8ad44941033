/**
 * Registration gate.
 *
 * After the public key is shown, add-environment waits until the user says
 * the key is registered with the Git host. The wait is an explicit state
 * machine: answers, cancellation and an optional deadline drive it from the
 * outside, and `wait()` resolves on the first terminal state.
 *
 * ```
 *              answer('yes')
 *   waiting ─────────────────▶ confirmed
 *      │ ▲
 *      │ └── answer(other) (prompts + 1)
 *      │
 *      ├── cancel() / abort ──▶ cancelled
 *      └── deadline / expire() ─▶ timed-out
 * ```
 */
import { observer } from '../observer.js'


export type GateState = 'waiting' | 'confirmed' | 'cancelled' | 'timed-out'


export interface RegistrationGateOptions {

    /** Identity id, for events */
    id: string

    /** Give up after this long; absent waits indefinitely */
    timeoutMs?: number

    /** Aborting cancels the gate */
    signal?: AbortSignal

    /** Clock, injectable for tests */
    now?: () => number
}


const AFFIRMATIVE = new Set(['y', 'yes'])


/**
 * Whether an answer confirms registration (`y`/`yes`, any case).
 */
export function isAffirmative(text: string): boolean {

    return AFFIRMATIVE.has(text.trim().toLowerCase())
}


/**
 * @example
 * ```typescript
 * const gate = new RegistrationGate({ id: 'work', timeoutMs: 600_000 })
 *
 * gate.answer('not yet')   // 'waiting', gate.prompts === 1
 * gate.answer('YES')       // 'confirmed'
 *
 * await gate.wait()        // 'confirmed'
 * ```
 */
export class RegistrationGate {

    readonly #id: string
    readonly #now: () => number
    readonly #deadline: number | null
    readonly #settled: Promise<GateState>
    #resolve: (state: GateState) => void = () => undefined
    #detach: () => void = () => undefined
    #state: GateState = 'waiting'
    #prompts = 0

    constructor(options: RegistrationGateOptions) {

        this.#id = options.id
        this.#now = options.now ?? Date.now
        this.#deadline = options.timeoutMs === undefined
            ? null
            : this.#now() + options.timeoutMs

        this.#settled = new Promise((resolve) => {

            this.#resolve = resolve
        })

        const { signal } = options

        if (signal?.aborted) {

            this.cancel()
        }
        else if (signal) {

            const onAbort = (): void => {

                this.cancel()
            }

            signal.addEventListener('abort', onAbort, { once: true })
            this.#detach = () => signal.removeEventListener('abort', onAbort)
        }
    }

    get state(): GateState {

        return this.#state
    }

    /** Non-affirmative answers received so far */
    get prompts(): number {

        return this.#prompts
    }

    get isSettled(): boolean {

        return this.#state !== 'waiting'
    }

    /**
     * Milliseconds until the deadline, or null without one.
     */
    remainingMs(now = this.#now()): number | null {

        return this.#deadline === null ? null : Math.max(0, this.#deadline - now)
    }

    /**
     * Feed one answer. Terminal states ignore input.
     */
    answer(text: string): GateState {

        if (this.isSettled) return this.#state

        if (this.#expired(this.#now())) return this.#transition('timed-out')

        if (isAffirmative(text)) return this.#transition('confirmed')

        this.#prompts++
        observer.emit('gate:changed', { id: this.#id, state: this.#state, prompts: this.#prompts })

        return this.#state
    }

    /**
     * Stop waiting. No effect once settled.
     */
    cancel(): GateState {

        if (this.isSettled) return this.#state

        return this.#transition('cancelled')
    }

    /**
     * Give up waiting because the deadline passed. No effect once settled.
     */
    expire(): GateState {

        if (this.isSettled) return this.#state

        return this.#transition('timed-out')
    }

    /**
     * Check the deadline against `now`.
     */
    tick(now = this.#now()): GateState {

        if (!this.isSettled && this.#expired(now)) return this.#transition('timed-out')

        return this.#state
    }

    /**
     * Resolves with the first terminal state.
     */
    wait(): Promise<GateState> {

        return this.#settled
    }

    #expired(now: number): boolean {

        return this.#deadline !== null && now >= this.#deadline
    }

    #transition(state: GateState): GateState {

        this.#state = state
        this.#detach()
        observer.emit('gate:changed', { id: this.#id, state, prompts: this.#prompts })
        this.#resolve(state)

        return state
    }
}
