/**
 * A single physical connection.
 *
 * Wraps one StorageEngine with its own Mutex, so operations on the handle are
 * strictly sequential, and takes a grant from the pool-wide gate so that
 * reads on different connections never overlap a write.
 *
 * Acquisition order is always mutex first, then gate. The handle is opened
 * lazily on first use; `ready` resolves once it is usable.
 */
import { attempt } from '@logosdx/utils'

import { ScopedReadContext, ScopedWriteContext, withContext } from '../context/context.js'
import type { ContextOwner, ReadContext, WriteContext } from '../context/types.js'
import type { StorageEngine } from '../engine/types.js'
import { DatabaseClosedError } from '../lock/errors.js'
import type { LockGate, LockMode, LockOptions } from '../lock/types.js'
import { Mutex } from '../mutex/mutex.js'
import { observer } from '../observer.js'
import type { OpenFactory } from './types.js'


export interface ConnectionOptions {
    factory: OpenFactory
    gate: LockGate
    readOnly: boolean
    name: string
}

/**
 * Outcome of a conditional acquisition. `won` is false when the claim was
 * declined after the mutex was acquired; nothing ran in that case.
 */
export type ClaimOutcome<T> =
    | { won: true; value: T }
    | { won: false }


/**
 * Milliseconds left until `deadline`, or undefined for no deadline.
 */
export function remaining(deadline: number | undefined): number | undefined {

    return deadline === undefined ? undefined : Math.max(0, deadline - Date.now())
}


export class Connection implements ContextOwner {

    readonly name: string
    readonly readOnly: boolean

    #factory: OpenFactory
    #gate: LockGate
    #mutex: Mutex
    #engine: StorageEngine | null = null
    #opening: Promise<StorageEngine> | null = null
    #closed = false

    constructor(options: ConnectionOptions) {

        this.name = options.name
        this.readOnly = options.readOnly
        this.#factory = options.factory
        this.#gate = options.gate
        this.#mutex = new Mutex(options.name)
    }

    get closed(): boolean {

        return this.#closed
    }

    /**
     * Whether the connection's mutex is held.
     */
    get locked(): boolean {

        return this.#mutex.locked
    }

    /**
     * Opened, not held, and nobody waiting for it.
     */
    get idle(): boolean {

        return this.#engine !== null && !this.#mutex.locked && this.#mutex.pending === 0
    }

    /**
     * Resolves once the handle is open. Opening starts on first access.
     * A failed open may be retried by accessing `ready` again.
     */
    get ready(): Promise<StorageEngine> {

        if (this.#engine) {

            return Promise.resolve(this.#engine)
        }

        if (!this.#opening) {

            this.#opening = this.#factory
                .open({ readOnly: this.readOnly, debugName: this.name })
                .then((engine) => {

                    this.#engine = engine
                    return engine
                })
                .catch((err: unknown) => {

                    this.#opening = null
                    return Promise.reject(err)
                })
        }

        return this.#opening
    }

    async readLock<T>(
        callback: (tx: ReadContext) => Promise<T>,
        options: LockOptions = {},
    ): Promise<T> {

        const outcome = await this.claimReadLock(() => true, callback, options)

        return unwrap(outcome)
    }

    async writeLock<T>(
        callback: (tx: WriteContext) => Promise<T>,
        options: LockOptions = {},
    ): Promise<T> {

        if (this.readOnly) {

            throw new Error(`Connection '${this.name}' is read-only`)
        }

        const outcome = await this.#hold('exclusive', () => true, (engine) =>
            withContext(new ScopedWriteContext(engine, this, options.debugContext), callback),
        options)

        return unwrap(outcome)
    }

    /**
     * Acquire this connection's mutex, then ask `claim` whether to go on.
     *
     * When `claim` returns false the mutex is released at once and nothing
     * else happens. Otherwise the shared gate is taken and `callback` runs
     * with a read context. The pool races several of these and lets only
     * the first claim succeed.
     */
    claimReadLock<T>(
        claim: () => boolean,
        callback: (tx: ReadContext) => Promise<T>,
        options: LockOptions = {},
    ): Promise<ClaimOutcome<T>> {

        return this.#hold('shared', claim, (engine) =>
            withContext(new ScopedReadContext(engine, this, options.debugContext), callback),
        options)
    }

    /**
     * Close the handle once any in-flight holder is done. Later lock
     * requests fail with DatabaseClosedError.
     */
    async close(): Promise<void> {

        if (this.#closed) {

            return
        }

        this.#closed = true

        const opening = this.#opening

        if (!opening) {

            return
        }

        // A failed open left nothing to dispose
        const [engine] = await attempt(() => opening)

        if (!engine) {

            return
        }

        await this.#mutex.lock(() => engine.dispose())

        observer.emit('connection:close', { name: this.name })
    }

    async #hold<T>(
        mode: LockMode,
        claim: () => boolean,
        run: (engine: StorageEngine) => Promise<T>,
        options: LockOptions,
    ): Promise<ClaimOutcome<T>> {

        if (this.#closed) {

            throw new DatabaseClosedError(this.name)
        }

        const deadline = options.timeout === undefined ? undefined : Date.now() + options.timeout

        return this.#mutex.lock(async (): Promise<ClaimOutcome<T>> => {

            if (!claim()) {

                return { won: false }
            }

            if (this.#closed) {

                throw new DatabaseClosedError(this.name)
            }

            const engine = await this.ready

            await this.#gate.acquire(this.name, mode, {
                timeout: remaining(deadline),
                debugContext: options.debugContext,
            })

            try {

                return { won: true, value: await run(engine) }
            }
            finally {

                await this.#gate.release(this.name)
            }
        }, { timeout: options.timeout })
    }
}


function unwrap<T>(outcome: ClaimOutcome<T>): T {

    if (!outcome.won) {

        // Unreachable with an always-true claim
        throw new Error('Lock claim was declined')
    }

    return outcome.value
}
