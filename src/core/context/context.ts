/**
 * Lock-scoped contexts.
 *
 * Created when a lock is granted, handed to the caller's callback, and
 * marked closed when the callback settles. A context holds a reference to
 * its engine and owner, never the other way round, and is invalidated by
 * a flag rather than destroyed.
 */
import type { ExecuteResult, Row, SqlParams, StorageEngine } from '../engine/types.js'
import { CardinalityError, ContextClosedError } from './errors.js'
import type { ContextOwner, ReadContext, WriteContext } from './types.js'


export class ScopedReadContext implements ReadContext {

    protected readonly engine: StorageEngine
    protected readonly debugContext: string | undefined

    #owner: ContextOwner
    #contextClosed = false

    constructor(engine: StorageEngine, owner: ContextOwner, debugContext?: string) {

        this.engine = engine
        this.debugContext = debugContext
        this.#owner = owner
    }

    get closed(): boolean {

        return this.#contextClosed || this.#owner.closed
    }

    /**
     * Invalidate the context. Idempotent.
     */
    markClosed(): void {

        this.#contextClosed = true
    }

    async get(sql: string, params: SqlParams = []): Promise<Row> {

        const rows = await this.getAll(sql, params)
        const [row] = rows

        if (rows.length !== 1 || !row) {

            throw new CardinalityError('exactly one', rows.length, sql)
        }

        return row
    }

    async getOptional(sql: string, params: SqlParams = []): Promise<Row | null> {

        const rows = await this.getAll(sql, params)

        if (rows.length > 1) {

            throw new CardinalityError('at most one', rows.length, sql)
        }

        return rows[0] ?? null
    }

    async getAll(sql: string, params: SqlParams = []): Promise<Row[]> {

        this.assertOpen()

        return this.engine.select(sql, params)
    }

    async getAutoCommit(): Promise<boolean> {

        this.assertOpen()

        return this.engine.getAutoCommit()
    }

    protected assertOpen(): void {

        if (this.closed) {

            throw new ContextClosedError(this.debugContext)
        }
    }
}


export class ScopedWriteContext extends ScopedReadContext implements WriteContext {

    async execute(sql: string, params: SqlParams = []): Promise<ExecuteResult> {

        this.assertOpen()

        return this.engine.execute(sql, params)
    }

    async executeBatch(sql: string, parameterSets: readonly SqlParams[]): Promise<void> {

        this.assertOpen()

        await this.engine.executeBatch(sql, parameterSets)
    }
}


/**
 * Run `callback` with a fresh context and close it once the callback
 * settles, whatever the outcome.
 */
export async function withContext<C extends ScopedReadContext, T>(
    context: C,
    callback: (context: C) => Promise<T>,
): Promise<T> {

    try {

        return await callback(context)
    }
    finally {

        context.markClosed()
    }
}
