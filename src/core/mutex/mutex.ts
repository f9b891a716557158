/**
 * Cooperative async mutex.
 *
 * At most one function runs under a given Mutex at a time. Waiters are
 * granted in FIFO order, and ownership passes directly from the releasing
 * caller to the next waiter so nobody can barge in between.
 *
 * Not reentrant: calling `lock` again from inside a locked function on the
 * same instance waits on itself forever (or until its timeout).
 *
 * @example
 * ```typescript
 * const mutex = new Mutex('writer')
 *
 * const count = await mutex.lock(async () => {
 *     return await tx.get('SELECT count(*) AS n FROM todos')
 * }, { timeout: 500 })
 * ```
 */
import { LockTimeoutError } from '../lock/errors.js'
import { observer } from '../observer.js'


export interface MutexOptions {
    /** Give up after this many milliseconds. The function is then never called. */
    timeout?: number
}

interface Waiter {
    grant: () => void
    timer: ReturnType<typeof setTimeout> | null
}


export class Mutex {

    readonly name: string

    #locked = false
    #waiters: Waiter[] = []

    constructor(name: string = 'mutex') {

        this.name = name
    }

    /**
     * Whether some function currently holds the mutex.
     */
    get locked(): boolean {

        return this.#locked
    }

    /**
     * Number of callers waiting to acquire.
     */
    get pending(): number {

        return this.#waiters.length
    }

    /**
     * Acquire, run `fn`, release.
     *
     * The mutex is released whether `fn` resolves or throws, and `fn`'s
     * outcome is passed through unchanged.
     *
     * @throws LockTimeoutError if `options.timeout` elapses before acquisition
     */
    async lock<T>(fn: () => T | Promise<T>, options: MutexOptions = {}): Promise<T> {

        await this.#acquire(options.timeout)

        try {

            return await fn()
        }
        finally {

            this.#release()
        }
    }

    #acquire(timeout?: number): Promise<void> {

        if (!this.#locked) {

            this.#locked = true
            return Promise.resolve()
        }

        if (timeout !== undefined && timeout <= 0) {

            return Promise.reject(this.#timedOut(timeout))
        }

        return new Promise<void>((resolve, reject) => {

            const waiter: Waiter = { grant: resolve, timer: null }

            if (timeout !== undefined) {

                waiter.timer = setTimeout(() => {

                    const index = this.#waiters.indexOf(waiter)

                    if (index !== -1) {

                        this.#waiters.splice(index, 1)
                    }

                    reject(this.#timedOut(timeout))
                }, timeout)
            }

            this.#waiters.push(waiter)
        })
    }

    #timedOut(timeout: number): LockTimeoutError {

        observer.emit('lock:timeout', { name: this.name, mode: 'exclusive', timeout })

        return new LockTimeoutError('exclusive', timeout, this.name)
    }

    #release(): void {

        const next = this.#waiters.shift()

        if (!next) {

            this.#locked = false
            return
        }

        // Ownership is handed over; #locked stays true.
        if (next.timer) {

            clearTimeout(next.timer)
        }

        next.grant()
    }
}
