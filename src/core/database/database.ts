/**
 * Top-level pooled database.
 *
 * Resolves options, owns the connection pool and the change-notification
 * stream, and makes sure the write connection (which creates the file and
 * switches it to WAL) is open before any read-only connection tries to
 * open the file.
 *
 * @example
 * ```typescript
 * const db = await SqliteDatabase.open({ filename: './app.db', maxReaders: 4 })
 *
 * await db.execute('CREATE TABLE IF NOT EXISTS todos (id INTEGER PRIMARY KEY, title TEXT)')
 * await db.execute('INSERT INTO todos (title) VALUES (?)', ['write docs'])
 *
 * const todo = await db.get('SELECT * FROM todos WHERE id = ?', [1])
 *
 * await db.close()
 * ```
 */
import { parseOptions, type DatabaseOptions, type DatabaseOptionsInput } from '../config/schema.js'
import { resolveOptions } from '../config/resolver.js'
import { createSqliteFactory } from '../connection/factory.js'
import type { OpenFactory } from '../connection/types.js'
import type { ContextOwner, ReadContext, WriteContext } from '../context/types.js'
import { UpdateStream } from '../engine/updates.js'
import type { LockOptions } from '../lock/types.js'
import { observer } from '../observer.js'
import { ConnectionPool } from '../pool/pool.js'
import { QueryMethods } from './queries.js'


export interface SqliteDatabaseInit {
    /**
     * Read LOCKSTEP_* variables from this environment. Pass `false` to
     * use only the given options.
     */
    env?: NodeJS.ProcessEnv | false

    /**
     * Open handles with this factory instead of better-sqlite3. Change
     * notifications are then up to the factory.
     */
    factory?: (options: DatabaseOptions, updates: UpdateStream) => OpenFactory
}


export class SqliteDatabase extends QueryMethods implements ContextOwner {

    readonly options: DatabaseOptions
    readonly updates: UpdateStream
    readonly name: string

    #pool: ConnectionPool
    #initPromise: Promise<void> | null = null

    constructor(input: Partial<DatabaseOptionsInput>, init: SqliteDatabaseInit = {}) {

        super()

        this.options = init.env === false
            ? parseOptions(input)
            : resolveOptions(input, { env: init.env })

        this.name = this.options.debugName ?? 'lockstep'
        this.updates = new UpdateStream(`${this.name}-updates`)

        const factory = init.factory
            ? init.factory(this.options, this.updates)
            : createSqliteFactory(this.options, this.updates)

        this.#pool = new ConnectionPool({
            factory,
            maxReaders: this.options.maxReaders,
            debugName: this.name,
            lockTimeout: this.options.lockTimeout,
        })
    }

    /**
     * Create and initialize a database.
     */
    static async open(
        input: Partial<DatabaseOptionsInput>,
        init: SqliteDatabaseInit = {},
    ): Promise<SqliteDatabase> {

        const db = new SqliteDatabase(input, init)
        await db.initialize()

        return db
    }

    get closed(): boolean {

        return this.#pool.closed
    }

    get maxReaders(): number {

        return this.#pool.maxReaders
    }

    /**
     * Open the write connection. Runs once; a failed attempt may be
     * retried by calling again.
     */
    async initialize(): Promise<void> {

        if (!this.#initPromise) {

            this.#initPromise = this.#pool
                .writeLock(async () => {})
                .then(() => {

                    observer.emit('database:initialized', {
                        name: this.name,
                        filename: this.options.filename,
                        maxReaders: this.options.maxReaders,
                    })
                })
                .catch((err: unknown) => {

                    this.#initPromise = null
                    return Promise.reject(err)
                })
        }

        await this.#initPromise
    }

    async readLock<T>(
        callback: (tx: ReadContext) => Promise<T>,
        options: LockOptions = {},
    ): Promise<T> {

        await this.initialize()

        return this.#pool.readLock(callback, options)
    }

    async writeLock<T>(
        callback: (tx: WriteContext) => Promise<T>,
        options: LockOptions = {},
    ): Promise<T> {

        await this.initialize()

        return this.#pool.writeLock(callback, options)
    }

    /**
     * True when the write connection has no open transaction.
     */
    async getAutoCommit(): Promise<boolean> {

        return this.#pool.getAutoCommit()
    }

    /**
     * Number of read connections opened so far.
     */
    get readerCount(): number {

        return this.#pool.readerCount
    }

    async close(): Promise<void> {

        if (this.#pool.closed) {

            return
        }

        await this.#pool.close()

        observer.emit('database:close', { name: this.name })
    }
}
