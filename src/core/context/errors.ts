/**
 * Context errors.
 */


/**
 * Error when a context is used after its lock was released.
 *
 * Always a programming error: a context must not escape the callback it
 * was handed to.
 *
 * @example
 * ```typescript
 * let leaked: ReadContext | undefined
 * await db.readLock(async (tx) => { leaked = tx })
 *
 * await leaked?.getAll('SELECT 1')   // throws ContextClosedError
 * ```
 */
export class ContextClosedError extends Error {

    override readonly name = 'ContextClosedError' as const

    constructor(
        public readonly debugContext?: string,
    ) {

        const label = debugContext ? ` '${debugContext}'` : ''

        super(`Context${label} is closed: its lock was released or its database was closed`)
    }
}


/**
 * Error when a query returns a different number of rows than required.
 */
export class CardinalityError extends Error {

    override readonly name = 'CardinalityError' as const

    constructor(
        public readonly expected: 'exactly one' | 'at most one',
        public readonly actual: number,
        public readonly sql: string,
    ) {

        super(`Expected ${expected} row, got ${actual}`)
    }
}
