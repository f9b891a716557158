/**
 * Control channel between a worker that hosts a database and the thread
 * that spawned it.
 *
 * The parent hands over one end of a fresh MessageChannel per client with
 * `{ type: 'connect', port }` and asks the worker to stop with
 * `{ type: 'shutdown' }`. The worker answers `{ type: 'ready' }` once the
 * host is up and `{ type: 'closed' }` once it has shut down.
 */
import { MessagePort } from 'node:worker_threads'
import { attempt, attemptSync } from '@logosdx/utils'
import { z } from 'zod'

import { observer } from '../observer.js'
import type { DatabaseHost } from './host.js'


export const ControlMessageSchema = z.discriminatedUnion('type', [
    z.object({ type: z.literal('connect'), port: z.instanceof(MessagePort) }),
    z.object({ type: z.literal('shutdown') }),
]);

export type ControlMessage = z.infer<typeof ControlMessageSchema>;

export const WorkerStatusSchema = z.discriminatedUnion('type', [
    z.object({ type: z.literal('ready') }),
    z.object({ type: z.literal('closed') }),
]);

export type WorkerStatus = z.infer<typeof WorkerStatusSchema>;

/**
 * Where control messages arrive: a worker's `parentPort`, or any
 * MessagePort in tests.
 */
export interface ControlPort {
    on(event: 'message', listener: (value: unknown) => void): unknown
    off(event: 'message', listener: (value: unknown) => void): unknown
    postMessage(value: WorkerStatus): void
}

export interface ServeOptions {
    /** Called after the host closed in response to a shutdown request. */
    onShutdown?: () => void
}


/**
 * Serve `host` to every port the parent sends over `control`.
 *
 * @returns cleanup function that stops listening (the host stays open)
 */
export function serveHost(control: ControlPort, host: DatabaseHost, options: ServeOptions = {}): () => void {

    const listener = (raw: unknown) => {

        const parsed = ControlMessageSchema.safeParse(raw)

        if (!parsed.success) {

            observer.emit('error', {
                source: 'host',
                error: new Error('Ignoring malformed control message'),
                context: { host: host.name },
            })
            return
        }

        const message = parsed.data

        if (message.type === 'connect') {

            const [, err] = attemptSync(() => host.attach(message.port))

            if (err) {

                // Closing the port tells the client it was turned away
                message.port.close()
                observer.emit('error', { source: 'host', error: err, context: { host: host.name } })
            }

            return
        }

        void shutdown()
    }

    const shutdown = async () => {

        control.off('message', listener)

        const [, err] = await attempt(() => host.close())

        if (err) {

            observer.emit('error', { source: 'host', error: err, context: { host: host.name } })
        }

        control.postMessage({ type: 'closed' })
        options.onShutdown?.()
    }

    control.on('message', listener)
    control.postMessage({ type: 'ready' })

    return () => {

        control.off('message', listener)
    }
}
