/**
 * Database handle shared across execution contexts.
 *
 * Wraps one CoordinationClient connected to a DatabaseHost. There is a
 * single remote handle, so there is no pool: each lock either goes through
 * a local Mutex (when the caller owns the only client of the host) or
 * through the host's arbiter with `requestSharedLock` /
 * `requestExclusiveLock` / `releaseLock`.
 *
 * @example
 * ```typescript
 * const db = new SharedDatabase(new CoordinationClient(port), { name: 'tab-2' })
 *
 * await db.writeTransaction(async (tx) => {
 *     await tx.execute('UPDATE todos SET done = 1 WHERE list_id = ?', [3])
 * })
 *
 * const stop = db.updates.subscribe(() => refresh(), { tables: ['todos'] })
 * ```
 */
import { attempt } from '@logosdx/utils'

import { ScopedReadContext, ScopedWriteContext, withContext } from '../context/context.js'
import type { ContextOwner, ReadContext, WriteContext } from '../context/types.js'
import type { UpdateStream } from '../engine/updates.js'
import { QueryMethods } from '../database/queries.js'
import { DatabaseClosedError, LockTimeoutError } from '../lock/errors.js'
import type { LockMode, LockOptions } from '../lock/types.js'
import type { Mutex } from '../mutex/mutex.js'
import { observer } from '../observer.js'
import type { CoordinationClient } from '../protocol/client.js'
import { UpstreamProtocolError } from '../protocol/errors.js'


export interface SharedDatabaseOptions {
    name?: string

    /**
     * Serialize every read and write through this mutex instead of asking
     * the host for grants.
     */
    mutex?: Mutex

    /** Default acquisition timeout in milliseconds. */
    lockTimeout?: number
}


export class SharedDatabase extends QueryMethods implements ContextOwner {

    readonly name: string

    #client: CoordinationClient
    #mutex: Mutex | null
    #lockTimeout: number | undefined
    #closed = false

    constructor(client: CoordinationClient, options: SharedDatabaseOptions = {}) {

        super()

        this.name = options.name ?? client.name
        this.#client = client
        this.#mutex = options.mutex ?? null
        this.#lockTimeout = options.lockTimeout
    }

    get closed(): boolean {

        return this.#closed || this.#client.closed
    }

    /**
     * Changes committed on the host by any client.
     */
    get updates(): UpdateStream {

        return this.#client.updates
    }

    readLock<T>(
        callback: (tx: ReadContext) => Promise<T>,
        options: LockOptions = {},
    ): Promise<T> {

        return this.#hold('shared', () =>
            withContext(new ScopedReadContext(this.#client, this, options.debugContext), callback),
        options)
    }

    writeLock<T>(
        callback: (tx: WriteContext) => Promise<T>,
        options: LockOptions = {},
    ): Promise<T> {

        return this.#hold('exclusive', () =>
            withContext(new ScopedWriteContext(this.#client, this, options.debugContext), callback),
        options)
    }

    /**
     * Runs without `BEGIN`: every client shares the host's one handle, so
     * concurrent read transactions would collide. The shared grant keeps
     * writers out for the whole callback.
     */
    override readTransaction<T>(
        callback: (tx: ReadContext) => Promise<T>,
        options?: LockOptions,
    ): Promise<T> {

        return this.readLock(callback, options)
    }

    async getAutoCommit(): Promise<boolean> {

        return this.#client.getAutoCommit()
    }

    /**
     * Disconnect from the host. Contexts still in use are closed with it;
     * the host and other clients are unaffected.
     */
    async close(): Promise<void> {

        if (this.#closed) {

            return
        }

        this.#closed = true
        await this.#client.dispose()
    }

    // ─────────────────────────────────────────────────────────────
    // Private helpers
    // ─────────────────────────────────────────────────────────────

    async #hold<T>(mode: LockMode, run: () => Promise<T>, options: LockOptions): Promise<T> {

        if (this.closed) {

            throw new DatabaseClosedError(this.name)
        }

        const lockOptions: LockOptions = {
            timeout: options.timeout ?? this.#lockTimeout,
            debugContext: options.debugContext,
        }

        if (this.#mutex) {

            return this.#mutex.lock(run, { timeout: lockOptions.timeout })
        }

        return this.#coordinated(mode, run, lockOptions)
    }

    async #coordinated<T>(mode: LockMode, run: () => Promise<T>, options: LockOptions): Promise<T> {

        try {

            await this.#client.acquire(this.name, mode, options)
        }
        catch (err) {

            if (err instanceof LockTimeoutError) {

                throw err
            }

            const kind = mode === 'shared' ? 'requestSharedLock' : 'requestExclusiveLock'
            const protocolError = err instanceof UpstreamProtocolError
                ? err
                : new UpstreamProtocolError(kind, err instanceof Error ? err.message : String(err))

            await this.#releaseQuietly()

            throw protocolError
        }

        let value: T

        try {

            value = await run()
        }
        catch (err) {

            await this.#releaseQuietly()
            throw err
        }

        await this.#client.release(this.name)

        return value
    }

    /**
     * Release without letting a failure replace the error already on its
     * way to the caller.
     */
    async #releaseQuietly(): Promise<void> {

        const [, err] = await attempt(() => this.#client.release(this.name))

        if (!err) {

            return
        }

        // Nothing was granted, so nothing to give back
        if (err instanceof UpstreamProtocolError && err.code === 'LockNotHeld') {

            return
        }

        observer.emit('error', {
            source: 'shared',
            error: err,
            context: { database: this.name },
        })
    }
}
