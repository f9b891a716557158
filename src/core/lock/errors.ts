/**
 * Lock-related errors.
 *
 * Specific error types let callers tell a recoverable timeout apart from
 * a programming error such as releasing a lock that was never granted.
 */
import type { HolderId, LockMode } from './types.js'


/**
 * Error when a lock cannot be acquired before its deadline.
 *
 * The callback guarded by the lock was never invoked. Safe to retry.
 *
 * @example
 * ```typescript
 * const [, err] = await attempt(() => db.writeLock(work, { timeout: 50 }))
 * if (err instanceof LockTimeoutError) {
 *     scheduleRetry()
 * }
 * ```
 */
export class LockTimeoutError extends Error {

    override readonly name = 'LockTimeoutError' as const

    constructor(
        public readonly mode: LockMode,
        public readonly timeout: number,
        public readonly lockName?: string,
    ) {

        const target = lockName ? ` on '${lockName}'` : ''

        super(`Timed out after ${timeout}ms waiting for ${mode} lock${target}`)
    }
}


/**
 * Error when a holder releases a lock it does not hold.
 */
export class LockNotHeldError extends Error {

    override readonly name = 'LockNotHeldError' as const

    constructor(
        public readonly lockName: string,
        public readonly holder: HolderId,
    ) {

        super(`Holder '${String(holder)}' does not hold a lock on '${lockName}'`)
    }
}


/**
 * Error when a lock is requested from a connection or database that has
 * already been closed.
 */
export class DatabaseClosedError extends Error {

    override readonly name = 'DatabaseClosedError' as const

    constructor(
        public readonly databaseName: string,
    ) {

        super(`Database '${databaseName}' is closed`)
    }
}
