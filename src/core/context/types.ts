/**
 * Context types.
 *
 * A context is the only way to run SQL while a lock is held. It is valid
 * for exactly one lock hold and permanently closed afterwards.
 */
import type { ExecuteResult, Row, SqlParams } from '../engine/types.js';

/**
 * Read access under a shared (or exclusive) lock.
 *
 * @example
 * ```typescript
 * const todo = await db.readLock(async (tx) => {
 *     return tx.getOptional('SELECT * FROM todos WHERE id = ?', [id])
 * })
 * ```
 */
export interface ReadContext {
    /** True once the lock was released or the owning database closed. */
    readonly closed: boolean;

    /**
     * Return the single row the query produces.
     *
     * @throws CardinalityError on zero rows or more than one
     */
    get(sql: string, params?: SqlParams): Promise<Row>;

    /**
     * Return the row the query produces, or null when there is none.
     *
     * @throws CardinalityError on more than one row
     */
    getOptional(sql: string, params?: SqlParams): Promise<Row | null>;

    getAll(sql: string, params?: SqlParams): Promise<Row[]>;

    /** True when no transaction is open on the underlying connection. */
    getAutoCommit(): Promise<boolean>;
}

/**
 * Read and write access under an exclusive lock.
 */
export interface WriteContext extends ReadContext {
    execute(sql: string, params?: SqlParams): Promise<ExecuteResult>;

    /**
     * Apply one statement once per parameter set, sequentially. No rows
     * are returned.
     */
    executeBatch(sql: string, parameterSets: readonly SqlParams[]): Promise<void>;
}

/**
 * Whatever owns the handle a context runs on. A closed owner closes every
 * context bound to it.
 */
export interface ContextOwner {
    readonly closed: boolean;
}
