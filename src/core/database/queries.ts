/**
 * Query helpers shared by every lock owner.
 *
 * Anything that can hand out read and write locks gets one-shot query
 * methods and transactions on top. Each helper takes its own lock for the
 * duration of the call.
 */
import { attempt } from '@logosdx/utils'

import type { ReadContext, WriteContext } from '../context/types.js'
import type { ExecuteResult, Row, SqlParams } from '../engine/types.js'
import type { LockOptions } from '../lock/types.js'
import { observer } from '../observer.js'


export abstract class QueryMethods {

    abstract readLock<T>(
        callback: (tx: ReadContext) => Promise<T>,
        options?: LockOptions,
    ): Promise<T>

    abstract writeLock<T>(
        callback: (tx: WriteContext) => Promise<T>,
        options?: LockOptions,
    ): Promise<T>

    get(sql: string, params: SqlParams = [], options?: LockOptions): Promise<Row> {

        return this.readLock((tx) => tx.get(sql, params), options)
    }

    getOptional(sql: string, params: SqlParams = [], options?: LockOptions): Promise<Row | null> {

        return this.readLock((tx) => tx.getOptional(sql, params), options)
    }

    getAll(sql: string, params: SqlParams = [], options?: LockOptions): Promise<Row[]> {

        return this.readLock((tx) => tx.getAll(sql, params), options)
    }

    execute(sql: string, params: SqlParams = [], options?: LockOptions): Promise<ExecuteResult> {

        return this.writeLock((tx) => tx.execute(sql, params), options)
    }

    executeBatch(sql: string, parameterSets: readonly SqlParams[], options?: LockOptions): Promise<void> {

        return this.writeLock((tx) => tx.executeBatch(sql, parameterSets), options)
    }

    /**
     * Run `callback` inside a read transaction, so every query sees the
     * same snapshot.
     *
     * @example
     * ```typescript
     * const { lists, todos } = await db.readTransaction(async (tx) => ({
     *     lists: await tx.getAll('SELECT * FROM lists'),
     *     todos: await tx.getAll('SELECT * FROM todos'),
     * }))
     * ```
     */
    readTransaction<T>(
        callback: (tx: ReadContext) => Promise<T>,
        options?: LockOptions,
    ): Promise<T> {

        return this.readLock(async (tx) => {

            await tx.getAll('BEGIN')

            try {

                return await callback(tx)
            }
            finally {

                await endTransaction(tx, 'END TRANSACTION')
            }
        }, options)
    }

    /**
     * Run `callback` inside `BEGIN IMMEDIATE` / `COMMIT`. Any failure rolls
     * the transaction back and is rethrown.
     *
     * @example
     * ```typescript
     * await db.writeTransaction(async (tx) => {
     *     const list = await tx.execute('INSERT INTO lists (name) VALUES (?) RETURNING id', ['Groceries'])
     *     await tx.executeBatch('INSERT INTO todos (list_id, title) VALUES (?, ?)', [
     *         [list.rows[0]?.['id'], 'milk'],
     *         [list.rows[0]?.['id'], 'eggs'],
     *     ])
     * })
     * ```
     */
    writeTransaction<T>(
        callback: (tx: WriteContext) => Promise<T>,
        options?: LockOptions,
    ): Promise<T> {

        return this.writeLock(async (tx) => {

            await tx.execute('BEGIN IMMEDIATE')

            try {

                const result = await callback(tx)
                await tx.execute('COMMIT')

                return result
            }
            catch (err) {

                await endTransaction(tx, 'ROLLBACK')
                throw err
            }
        }, options)
    }
}


/**
 * Close the open transaction, if the callback didn't already.
 *
 * Failures are reported but never replace the callback's own outcome.
 */
async function endTransaction(tx: ReadContext, statement: string): Promise<void> {

    const [autoCommit] = await attempt(() => tx.getAutoCommit())

    if (autoCommit === true) {

        return
    }

    const [, err] = await attempt(() => tx.getAll(statement))

    if (err) {

        observer.emit('error', {
            source: 'transaction',
            error: err,
            context: { statement },
        })
    }
}
