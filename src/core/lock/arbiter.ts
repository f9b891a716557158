/**
 * Shared/exclusive lock arbiter.
 *
 * Owns the lock state for one database handle: `UNLOCKED`, `HELD(shared, n)`
 * or `HELD(exclusive)`. Callers never touch that state; they request and
 * release grants. The pool uses one arbiter in-process to keep writes apart
 * from reads, and the cross-context host uses one on behalf of every client
 * port it serves.
 *
 * Waiters are served strictly FIFO. A queued exclusive request blocks shared
 * requests that arrive after it, so a steady stream of readers cannot starve
 * a writer. Consecutive shared waiters at the head of the queue are granted
 * together.
 *
 * @example
 * ```typescript
 * const arbiter = new LockArbiter('main')
 *
 * await arbiter.acquire('reader-1', 'shared')
 * await arbiter.acquire('reader-2', 'shared')
 *
 * const write = arbiter.acquire('writer', 'exclusive')   // queued
 *
 * arbiter.release('reader-1')
 * arbiter.release('reader-2')
 * await write                                            // granted now
 * ```
 */
import { observer } from '../observer.js'
import { LockNotHeldError, LockTimeoutError } from './errors.js'
import type { ArbiterState, HolderId, LockGate, LockMode, LockOptions } from './types.js'


interface PendingGrant {
    holder: HolderId
    mode: LockMode
    requestedAt: number
    timer: ReturnType<typeof setTimeout> | null
    grant: () => void
    reject: (err: Error) => void
}


export class LockArbiter implements LockGate {

    readonly name: string

    #state: ArbiterState = { status: 'unlocked' }
    #sharedHolders = new Map<HolderId, number>()
    #queue: PendingGrant[] = []

    constructor(name: string = 'arbiter') {

        this.name = name
    }

    /**
     * Snapshot of the current state.
     */
    get state(): ArbiterState {

        return { ...this.#state }
    }

    /**
     * Number of requests waiting for a grant.
     */
    get pending(): number {

        return this.#queue.length
    }

    /**
     * Request a grant.
     *
     * Resolves once granted. Rejects with LockTimeoutError if `timeout`
     * elapses first, in which case the request leaves the queue and
     * nothing is held.
     */
    acquire(holder: HolderId, mode: LockMode, options: LockOptions = {}): Promise<void> {

        const { timeout } = options

        observer.emit('lock:acquiring', { name: this.name, mode, timeout })

        if (this.#queue.length === 0 && this.#canGrant(mode)) {

            this.#grant(holder, mode, Date.now())
            return Promise.resolve()
        }

        if (timeout !== undefined && timeout <= 0) {

            observer.emit('lock:timeout', { name: this.name, mode, timeout })
            return Promise.reject(new LockTimeoutError(mode, timeout, this.name))
        }

        return new Promise<void>((resolve, reject) => {

            const pending: PendingGrant = {
                holder,
                mode,
                requestedAt: Date.now(),
                timer: null,
                grant: resolve,
                reject,
            }

            if (timeout !== undefined) {

                pending.timer = setTimeout(() => {

                    this.#remove(pending)
                    observer.emit('lock:timeout', { name: this.name, mode, timeout })
                    reject(new LockTimeoutError(mode, timeout, this.name))

                    // A timed-out exclusive request may have been the only
                    // thing holding back shared requests behind it.
                    this.#drain()
                }, timeout)
            }

            this.#queue.push(pending)
        })
    }

    /**
     * Release one grant held by `holder`.
     *
     * @throws LockNotHeldError if the holder holds nothing
     */
    release(holder: HolderId): void {

        const state = this.#state

        if (state.status === 'exclusive' && state.holder === holder) {

            this.#state = { status: 'unlocked' }
            observer.emit('lock:released', { name: this.name, mode: 'exclusive' })
            this.#drain()
            return
        }

        const count = this.#sharedHolders.get(holder)

        if (state.status !== 'shared' || count === undefined) {

            throw new LockNotHeldError(this.name, holder)
        }

        if (count > 1) {

            this.#sharedHolders.set(holder, count - 1)
        }
        else {

            this.#sharedHolders.delete(holder)
        }

        this.#state = state.holders > 1
            ? { status: 'shared', holders: state.holders - 1 }
            : { status: 'unlocked' }

        observer.emit('lock:released', { name: this.name, mode: 'shared' })
        this.#drain()
    }

    /**
     * Drop every grant and queued request belonging to `holder`.
     *
     * Used when a client goes away without releasing. Queued requests
     * are rejected with `reason`.
     *
     * @returns number of grants released
     */
    releaseAll(holder: HolderId, reason: Error): number {

        let released = 0

        for (const pending of [...this.#queue]) {

            if (pending.holder === holder) {

                this.#remove(pending)
                pending.reject(reason)
            }
        }

        const state = this.#state

        if (state.status === 'exclusive' && state.holder === holder) {

            this.#state = { status: 'unlocked' }
            released = 1
        }

        const count = this.#sharedHolders.get(holder)

        if (state.status === 'shared' && count !== undefined) {

            this.#sharedHolders.delete(holder)
            released = count

            const remaining = state.holders - count
            this.#state = remaining > 0
                ? { status: 'shared', holders: remaining }
                : { status: 'unlocked' }
        }

        this.#drain()

        return released
    }

    /**
     * Run `fn` while holding a grant. The grant is released on every exit
     * path.
     */
    async withLock<T>(
        holder: HolderId,
        mode: LockMode,
        fn: () => Promise<T>,
        options: LockOptions = {},
    ): Promise<T> {

        await this.acquire(holder, mode, options)

        try {

            return await fn()
        }
        finally {

            this.release(holder)
        }
    }


    // ─────────────────────────────────────────────────────────────
    // Private helpers
    // ─────────────────────────────────────────────────────────────

    #canGrant(mode: LockMode): boolean {

        if (mode === 'exclusive') {

            return this.#state.status === 'unlocked'
        }

        return this.#state.status !== 'exclusive'
    }

    #grant(holder: HolderId, mode: LockMode, requestedAt: number): void {

        if (mode === 'exclusive') {

            this.#state = { status: 'exclusive', holder }
        }
        else {

            const state = this.#state
            const holders = state.status === 'shared' ? state.holders : 0

            this.#state = { status: 'shared', holders: holders + 1 }
            this.#sharedHolders.set(holder, (this.#sharedHolders.get(holder) ?? 0) + 1)
        }

        observer.emit('lock:acquired', {
            name: this.name,
            mode,
            waitedMs: Date.now() - requestedAt,
        })
    }

    #drain(): void {

        let head = this.#queue[0]

        while (head && this.#canGrant(head.mode)) {

            this.#queue.shift()

            if (head.timer) {

                clearTimeout(head.timer)
            }

            this.#grant(head.holder, head.mode, head.requestedAt)
            head.grant()

            head = this.#queue[0]
        }
    }

    #remove(pending: PendingGrant): void {

        const index = this.#queue.indexOf(pending)

        if (index !== -1) {

            this.#queue.splice(index, 1)
        }

        if (pending.timer) {

            clearTimeout(pending.timer)
        }
    }
}
