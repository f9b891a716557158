/**
 * Run a DatabaseHost in its own worker thread.
 *
 * The worker owns the only handle to the database file; every thread that
 * wants access connects a CoordinationClient to it.
 *
 * @example
 * ```typescript
 * const handle = await spawnHost({ filename: './app.db' })
 *
 * const db = new SharedDatabase(handle.connect({ name: 'ui' }))
 * await db.execute('INSERT INTO todos (title) VALUES (?)', ['ship it'])
 *
 * await db.close()
 * await handle.shutdown()
 * ```
 */
import { MessageChannel, Worker, type MessagePort } from 'node:worker_threads'

import { parseOptions, type DatabaseOptionsInput } from '../config/schema.js'
import { CoordinationClient, type CoordinationClientOptions } from './client.js'
import { WorkerStatusSchema, type ControlMessage, type WorkerStatus } from './serve.js'


export interface SpawnOptions {
    /** Worker script to run. Defaults to the bundled host worker. */
    workerUrl?: URL
}

export interface HostHandle {
    readonly worker: Worker

    /** Open a new client connection to the hosted database. */
    connect(options?: CoordinationClientOptions): CoordinationClient

    /** Close the hosted database and wait for the worker to exit. */
    shutdown(): Promise<void>
}


/**
 * Start a host worker for `options.filename`. Resolves once the database
 * is open in the worker.
 */
export async function spawnHost(
    options: DatabaseOptionsInput,
    spawnOptions: SpawnOptions = {},
): Promise<HostHandle> {

    const workerData = parseOptions(options)
    const workerUrl = spawnOptions.workerUrl ?? new URL('../../worker/host-worker.js', import.meta.url)
    const worker = new Worker(workerUrl, { workerData })

    await nextStatus(worker, 'ready')

    const send = (message: ControlMessage, transfer: MessagePort[] = []) => {

        worker.postMessage(message, transfer)
    }

    return {
        worker,

        connect(clientOptions = {}) {

            const { port1, port2 } = new MessageChannel()

            send({ type: 'connect', port: port2 }, [port2])

            return new CoordinationClient(port1, {
                name: clientOptions.name ?? workerData.debugName,
            })
        },

        async shutdown() {

            const closed = nextStatus(worker, 'closed')

            send({ type: 'shutdown' })

            await closed
            await worker.terminate()
        },
    }
}


/**
 * Resolve when the worker reports `status`; reject if it fails or exits
 * first.
 */
function nextStatus(worker: Worker, status: WorkerStatus['type']): Promise<void> {

    return new Promise((resolve, reject) => {

        const cleanup = () => {

            worker.off('message', onMessage)
            worker.off('error', onError)
            worker.off('exit', onExit)
        }

        const onMessage = (raw: unknown) => {

            const parsed = WorkerStatusSchema.safeParse(raw)

            if (parsed.success && parsed.data.type === status) {

                cleanup()
                resolve()
            }
        }

        const onError = (err: Error) => {

            cleanup()
            reject(err)
        }

        const onExit = (code: number) => {

            cleanup()
            reject(new Error(`Host worker exited with code ${code} before '${status}'`))
        }

        worker.on('message', onMessage)
        worker.on('error', onError)
        worker.on('exit', onExit)
    })
}
