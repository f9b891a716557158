/**
 * Connection pool with a single write connection and a bounded set of
 * read connections.
 *
 * Connections are opened on demand. The write connection is created by the
 * first write and kept for the pool's lifetime. Read connections are added
 * only when no existing reader is idle, up to `maxReaders`.
 *
 * A read does not queue behind a pool-wide lock. It races one attempt per
 * reader; the first attempt to get its connection claims the call, and
 * every other attempt lets go of its connection untouched as soon as it
 * gets it. Timeouts of losing attempts are ignored; the call only times
 * out when every attempt did.
 *
 * @example
 * ```typescript
 * const pool = new ConnectionPool({ factory, maxReaders: 3, debugName: 'app' })
 *
 * await pool.writeLock(async (tx) => {
 *     await tx.execute('INSERT INTO todos (title) VALUES (?)', ['ship it'])
 * })
 *
 * const todos = await pool.readLock((tx) => tx.getAll('SELECT * FROM todos'))
 * ```
 */
import { attempt } from '@logosdx/utils'

import { Connection, type ClaimOutcome } from '../connection/connection.js'
import type { OpenFactory } from '../connection/types.js'
import type { ContextOwner, ReadContext, WriteContext } from '../context/types.js'
import { LockArbiter } from '../lock/arbiter.js'
import { DatabaseClosedError, LockTimeoutError } from '../lock/errors.js'
import type { LockGate, LockOptions } from '../lock/types.js'
import { observer } from '../observer.js'


export interface PoolOptions {
    factory: OpenFactory

    /** Upper bound on read connections. At least 1. */
    maxReaders: number

    /** Prefix for connection names in events and errors. */
    debugName: string

    /** Timeout applied when a lock call passes none, in milliseconds. */
    lockTimeout?: number

    /**
     * Gate that keeps reads and writes apart. Defaults to a private
     * in-process arbiter.
     */
    gate?: LockGate
}


export class ConnectionPool implements ContextOwner {

    readonly maxReaders: number
    readonly name: string

    #factory: OpenFactory
    #gate: LockGate
    #lockTimeout: number | undefined
    #writer: Connection | null = null
    #readers: Connection[] = []
    #closed = false

    constructor(options: PoolOptions) {

        if (!Number.isInteger(options.maxReaders) || options.maxReaders < 1) {

            throw new RangeError(`maxReaders must be a whole number of at least 1, got ${options.maxReaders}`)
        }

        this.#factory = options.factory
        this.#gate = options.gate ?? new LockArbiter(options.debugName)
        this.#lockTimeout = options.lockTimeout
        this.maxReaders = options.maxReaders
        this.name = options.debugName
    }

    get closed(): boolean {

        return this.#closed
    }

    /**
     * Number of read connections opened so far.
     */
    get readerCount(): number {

        return this.#readers.length
    }

    /**
     * Whether the write connection has been created.
     */
    get hasWriter(): boolean {

        return this.#writer !== null
    }

    async readLock<T>(
        callback: (tx: ReadContext) => Promise<T>,
        options: LockOptions = {},
    ): Promise<T> {

        if (this.#closed) {

            throw new DatabaseClosedError(this.name)
        }

        const opts = { ...options, timeout: options.timeout ?? this.#lockTimeout }

        await this.#expandPool()

        const readers = this.#readers.slice()

        observer.emit('pool:race', { name: this.name, attempts: readers.length })

        return new Promise<T>((resolve, reject) => {

            let winner = -1
            let unsettled = readers.length
            let failure: Error | null = null

            const settleLoser = (err: Error | null) => {

                if (err && !(err instanceof LockTimeoutError) && !failure) {

                    failure = err
                }

                unsettled--

                if (unsettled === 0 && winner === -1) {

                    reject(failure ?? new LockTimeoutError('shared', opts.timeout ?? 0, this.name))
                }
            }

            readers.forEach((connection, index) => {

                const claim = () => {

                    if (winner !== -1) {

                        return false
                    }

                    winner = index
                    return true
                }

                void connection.claimReadLock(claim, callback, opts).then(
                    (outcome: ClaimOutcome<T>) => {

                        if (outcome.won) {

                            resolve(outcome.value)
                            return
                        }

                        settleLoser(null)
                    },
                    (err: unknown) => {

                        const error = err instanceof Error ? err : new Error(String(err))

                        if (index === winner) {

                            reject(error)
                            return
                        }

                        settleLoser(error)
                    },
                )
            })
        })
    }

    async writeLock<T>(
        callback: (tx: WriteContext) => Promise<T>,
        options: LockOptions = {},
    ): Promise<T> {

        if (this.#closed) {

            throw new DatabaseClosedError(this.name)
        }

        this.#writer ??= new Connection({
            factory: this.#factory,
            gate: this.#gate,
            readOnly: false,
            name: `${this.name}-writer`,
        })

        return this.#writer.writeLock(callback, {
            ...options,
            timeout: options.timeout ?? this.#lockTimeout,
        })
    }

    /**
     * Autocommit state of the write connection. True before any write.
     */
    async getAutoCommit(): Promise<boolean> {

        if (!this.#writer) {

            return true
        }

        const engine = await this.#writer.ready

        return engine.getAutoCommit()
    }

    /**
     * Close every connection. In-flight holders finish first; later lock
     * calls fail with DatabaseClosedError.
     */
    async close(): Promise<void> {

        if (this.#closed) {

            return
        }

        this.#closed = true

        const connections = [...this.#readers, ...(this.#writer ? [this.#writer] : [])]

        for (const connection of connections) {

            const [, err] = await attempt(() => connection.close())

            if (err) {

                observer.emit('error', {
                    source: 'pool',
                    error: err,
                    context: { connection: connection.name },
                })
            }
        }

        this.#readers = []
    }

    /**
     * Open one more reader when none is idle and the cap allows it.
     *
     * The requesting call waits for the new reader to finish opening
     * before it races, so that concurrent callers don't open yet another
     * reader for the same demand and a closing database never has a
     * half-open handle.
     */
    async #expandPool(): Promise<void> {

        if (this.#readers.length >= this.maxReaders) {

            return
        }

        if (this.#readers.some((reader) => reader.idle)) {

            return
        }

        const connection = new Connection({
            factory: this.#factory,
            gate: this.#gate,
            readOnly: true,
            name: `${this.name}-reader-${this.#readers.length + 1}`,
        })

        this.#readers.push(connection)

        observer.emit('pool:grow', {
            name: this.name,
            readers: this.#readers.length,
            maxReaders: this.maxReaders,
        })

        const [, err] = await attempt(() => connection.ready)

        if (err) {

            this.#readers = this.#readers.filter((reader) => reader !== connection)
            throw err
        }
    }
}
