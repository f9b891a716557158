/**
 * Lock types.
 *
 * Vocabulary shared by the in-process mutex path and the cross-context
 * arbiter path. A shared lock admits concurrent holders; an exclusive lock
 * admits exactly one holder and no shared holders.
 */

/**
 * Lock mode requested from a gate or arbiter.
 */
export type LockMode = 'shared' | 'exclusive';

/**
 * Identity of a lock holder.
 *
 * Connections use their debug name; the cross-context host uses the
 * numeric id of the client port.
 */
export type HolderId = string | number;

/**
 * Options accepted by every lock acquisition.
 *
 * @example
 * ```typescript
 * await db.writeLock(async (tx) => {
 *     await tx.execute('DELETE FROM todos WHERE done = 1')
 * }, { timeout: 2_000, debugContext: 'purge-done' })
 * ```
 */
export interface LockOptions {
    /**
     * Maximum time to wait for the lock, in milliseconds.
     *
     * Omit to wait indefinitely. A value of 0 succeeds only if the lock
     * is immediately available.
     */
    timeout?: number;

    /**
     * Label attached to events and errors raised for this acquisition.
     */
    debugContext?: string;
}

/**
 * A single acquisition attempt. Exists only for the duration of one
 * `readLock` / `writeLock` call.
 */
export interface LockRequest extends LockOptions {
    mode: LockMode;
}

/**
 * Observable arbiter state.
 *
 * `shared.holders` counts grants, not distinct holders: one holder may
 * hold several shared grants at once.
 */
export type ArbiterState =
    | { status: 'unlocked' }
    | { status: 'shared'; holders: number }
    | { status: 'exclusive'; holder: HolderId };

/**
 * Anything that can hand out shared and exclusive grants.
 *
 * Implemented in-process by LockArbiter and across a worker boundary by
 * the coordination client.
 */
export interface LockGate {
    acquire(holder: HolderId, mode: LockMode, options?: LockOptions): Promise<void>;
    release(holder: HolderId): void | Promise<void>;
}
