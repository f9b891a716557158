/**
 * Worker-thread entry that hosts one database for other threads.
 *
 * Started by `spawnHost` with the resolved database options as
 * `workerData`.
 */
import { parentPort, workerData } from 'node:worker_threads'

import { parseOptions } from '../core/config/schema.js'
import { SqliteEngine } from '../core/engine/sqlite.js'
import { UpdateStream } from '../core/engine/updates.js'
import { DatabaseHost } from '../core/protocol/host.js'
import { serveHost } from '../core/protocol/serve.js'


const control = parentPort

if (!control) {

    throw new Error('host-worker must run inside a worker thread')
}

const options = parseOptions(workerData)
const name = options.debugName ?? 'lockstep-host'
const updates = new UpdateStream(`${name}-updates`)

const engine = new SqliteEngine({
    filename: options.filename,
    readOnly: false,
    busyTimeout: options.busyTimeout,
    journalMode: options.journalMode,
    updates,
})

const host = new DatabaseHost({ engine, updates, name })

serveHost(control, host)
