/**
 * Connection types.
 *
 * A connection factory opens physical handles on demand. The pool only ever
 * sees the StorageEngine it returns.
 */
import type { StorageEngine } from '../engine/types.js';

/**
 * What to open.
 */
export interface OpenOptions {
    /** Open a handle that rejects writes. */
    readOnly: boolean;

    /** Label used in events and errors. */
    debugName: string;
}

/**
 * Opens physical handles.
 *
 * `open` resolves only once the handle is fully usable.
 *
 * @example
 * ```typescript
 * const factory: OpenFactory = {
 *     open: async ({ readOnly }) => new SqliteEngine({ filename, readOnly, busyTimeout: 5_000, journalMode: 'wal' }),
 * }
 * ```
 */
export interface OpenFactory {
    open(options: OpenOptions): Promise<StorageEngine>;
}
