/**
 * Lock module exports.
 *
 * Provides the shared/exclusive vocabulary, lock errors, and the arbiter
 * that owns lock state for one database handle.
 *
 * @example
 * ```typescript
 * import { LockArbiter, LockTimeoutError } from './lock'
 *
 * const arbiter = new LockArbiter('main')
 *
 * await arbiter.withLock('writer', 'exclusive', async () => {
 *     await applyMigration()
 * }, { timeout: 1_000 })
 * ```
 */

// Types
export type {
    ArbiterState,
    HolderId,
    LockGate,
    LockMode,
    LockOptions,
    LockRequest,
} from './types.js';

// Errors
export {
    DatabaseClosedError,
    LockNotHeldError,
    LockTimeoutError,
} from './errors.js';

// Arbiter
export { LockArbiter } from './arbiter.js';
