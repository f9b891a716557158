/**
 * SQLite connection factory with retry logic.
 *
 * Opens better-sqlite3 handles, retrying while another process holds the
 * file busy (for example during WAL recovery). Each handle is probed with
 * `SELECT 1` before it is handed out.
 */
import { retry, attempt } from '@logosdx/utils'

import type { DatabaseOptions } from '../config/schema.js'
import { SqliteEngine } from '../engine/sqlite.js'
import type { StorageEngine } from '../engine/types.js'
import type { UpdateStream } from '../engine/updates.js'
import { observer } from '../observer.js'
import type { OpenFactory, OpenOptions } from './types.js'


/**
 * Whether an open failure is worth retrying.
 *
 * Only lock contention on the file is transient; a missing file or bad
 * path will not fix itself.
 */
export function isTransientOpenError(err: Error): boolean {

    const msg = err.message.toLowerCase()

    return msg.includes('database is locked') ||
           msg.includes('sqlite_busy') ||
           msg.includes('database is busy')
}


/**
 * Create a factory that opens SQLite handles for `options.filename`.
 *
 * Writes made through the handles publish change notifications on
 * `updates`.
 *
 * @example
 * ```typescript
 * const updates = new UpdateStream()
 * const factory = createSqliteFactory(parseOptions({ filename: './app.db' }), updates)
 *
 * const writer = await factory.open({ readOnly: false, debugName: 'app-writer' })
 * ```
 */
export function createSqliteFactory(
    options: Pick<DatabaseOptions, 'filename' | 'busyTimeout' | 'journalMode'>,
    updates?: UpdateStream,
): OpenFactory {

    return {
        open: (openOptions) => openSqlite(options, openOptions, updates),
    }
}


async function openSqlite(
    options: Pick<DatabaseOptions, 'filename' | 'busyTimeout' | 'journalMode'>,
    { readOnly, debugName }: OpenOptions,
    updates?: UpdateStream,
): Promise<StorageEngine> {

    const startTime = Date.now()

    const [engine, err] = await attempt(() =>
        retry(
            async () => {

                const engine = new SqliteEngine({
                    filename: options.filename,
                    readOnly,
                    busyTimeout: options.busyTimeout,
                    journalMode: options.journalMode,
                    updates,
                })

                // Probe the handle before anyone relies on it
                const [, probeErr] = await attempt(() => engine.select('SELECT 1'))

                if (probeErr) {

                    await engine.dispose()
                    throw probeErr
                }

                return engine
            },
            {
                retries: 3,
                delay: 50,
                backoff: 2,  // 50ms, 100ms, 200ms
                jitterFactor: 0.1,
                shouldRetry: isTransientOpenError,
            }
        )
    )

    if (!engine) {

        const error = err ?? new Error(`Failed to open connection '${debugName}'`)

        observer.emit('connection:error', { name: debugName, error: error.message })
        throw error
    }

    observer.emit('connection:open', {
        name: debugName,
        readOnly,
        durationMs: Date.now() - startTime,
    })

    return engine
}
