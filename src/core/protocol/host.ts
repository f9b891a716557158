/**
 * Arbiter side of the cross-context protocol.
 *
 * The host owns the one storage engine and the one LockArbiter for a
 * database, and serves any number of client ports. Each attached port is
 * one holder identity. When a port closes, everything it held or was
 * waiting for is dropped so other clients are not locked out.
 *
 * Queries are run exactly as received. Holding a grant before querying is
 * the client's side of the contract; SharedDatabase always does.
 *
 * @example
 * ```typescript
 * const updates = new UpdateStream()
 * const engine = new SqliteEngine({ filename: './app.db', readOnly: false, busyTimeout: 5000, journalMode: 'wal', updates })
 * const host = new DatabaseHost({ engine, updates, name: 'app' })
 *
 * const client = new CoordinationClient(host.connect(), { name: 'tab-1' })
 * ```
 */
import { MessageChannel, type MessagePort } from 'node:worker_threads'
import { attempt } from '@logosdx/utils'

import type { StorageEngine } from '../engine/types.js'
import type { UpdateNotification, UpdateStream } from '../engine/updates.js'
import { LockArbiter } from '../lock/arbiter.js'
import { DatabaseClosedError, LockNotHeldError, LockTimeoutError } from '../lock/errors.js'
import type { ArbiterState } from '../lock/types.js'
import { observer } from '../observer.js'
import {
    QUERY_MESSAGE_KINDS,
    RequestSchema,
    type ErrorCode,
    type HostMessage,
    type MessageKind,
    type Request,
} from './messages.js'


export interface DatabaseHostOptions {
    engine: StorageEngine

    /** Stream the engine publishes committed changes on. Forwarded to every client. */
    updates?: UpdateStream

    name?: string
}


export class DatabaseHost {

    readonly name: string

    #engine: StorageEngine
    #arbiter: LockArbiter
    #clients = new Map<number, MessagePort>()
    #nextClientId = 1
    #closed = false
    #stopUpdates: (() => void) | null = null

    constructor(options: DatabaseHostOptions) {

        this.name = options.name ?? 'host'
        this.#engine = options.engine
        this.#arbiter = new LockArbiter(this.name)

        if (options.updates) {

            this.#stopUpdates = options.updates.subscribe((update) => this.#broadcast(update))
        }
    }

    get closed(): boolean {

        return this.#closed
    }

    get clientCount(): number {

        return this.#clients.size
    }

    /**
     * Current arbiter state, for diagnostics.
     */
    get state(): ArbiterState {

        return this.#arbiter.state
    }

    /**
     * Start serving requests arriving on `port`.
     *
     * @returns the holder id assigned to the port
     * @throws DatabaseClosedError after `close()`
     */
    attach(port: MessagePort): number {

        if (this.#closed) {

            throw new DatabaseClosedError(this.name)
        }

        const clientId = this.#nextClientId++

        this.#clients.set(clientId, port)

        port.on('message', (raw: unknown) => {

            void this.#handle(clientId, port, raw)
        })
        port.on('close', () => this.#detach(clientId))

        observer.emit('host:attached', { name: this.name, clientId })

        return clientId
    }

    /**
     * Attach one end of a fresh channel and return the other end, ready
     * to hand to a CoordinationClient.
     */
    connect(): MessagePort {

        const { port1, port2 } = new MessageChannel()

        this.attach(port1)

        return port2
    }

    /**
     * Disconnect every client and dispose the engine.
     */
    async close(): Promise<void> {

        if (this.#closed) {

            return
        }

        this.#closed = true
        this.#stopUpdates?.()

        for (const port of [...this.#clients.values()]) {

            port.close()
        }

        await this.#engine.dispose()
    }

    // ─────────────────────────────────────────────────────────────
    // Request handling
    // ─────────────────────────────────────────────────────────────

    async #handle(clientId: number, port: MessagePort, raw: unknown): Promise<void> {

        const parsed = RequestSchema.safeParse(raw)

        if (!parsed.success) {

            const reason = parsed.error.issues[0]?.message ?? 'malformed request'

            observer.emit('host:rejected', { name: this.name, clientId, reason })

            const id = requestId(raw)

            if (id !== null) {

                this.#reply(clientId, port, {
                    type: 'response',
                    id,
                    ok: false,
                    error: { code: 'BadRequest', message: reason },
                })
            }

            return
        }

        const request = parsed.data
        const [value, err] = await attempt(() => this.#dispatch(clientId, request))

        if (err) {

            this.#reply(clientId, port, {
                type: 'response',
                id: request.id,
                ok: false,
                error: { code: errorCode(request.kind, err), message: err.message },
            })
            return
        }

        this.#reply(clientId, port, { type: 'response', id: request.id, ok: true, value })
    }

    async #dispatch(clientId: number, request: Request): Promise<unknown> {

        if (this.#closed) {

            throw new DatabaseClosedError(this.name)
        }

        switch (request.kind) {

            case 'requestSharedLock':
                await this.#arbiter.acquire(clientId, 'shared', { timeout: request.payload?.timeout })
                return null

            case 'requestExclusiveLock':
                await this.#arbiter.acquire(clientId, 'exclusive', { timeout: request.payload?.timeout })
                return null

            case 'releaseLock':
                this.#arbiter.release(clientId)
                return null

            case 'getAutoCommit':
                return this.#engine.getAutoCommit()

            case 'select':
                return this.#engine.select(request.payload.sql, request.payload.params)

            case 'execute':
                return this.#engine.execute(request.payload.sql, request.payload.params)

            case 'executeBatch':
                await this.#engine.executeBatch(request.payload.sql, request.payload.parameterSets)
                return null
        }
    }

    #reply(clientId: number, port: MessagePort, message: HostMessage): void {

        // Answers to a client that already left have nowhere to go
        if (!this.#clients.has(clientId)) {

            return
        }

        port.postMessage(message)
    }

    #broadcast(update: UpdateNotification): void {

        const message: HostMessage = { type: 'update', tables: [...update.tables] }

        for (const port of this.#clients.values()) {

            port.postMessage(message)
        }
    }

    #detach(clientId: number): void {

        if (!this.#clients.delete(clientId)) {

            return
        }

        const releasedHolds = this.#arbiter.releaseAll(
            clientId,
            new Error(`Client ${clientId} disconnected`),
        )

        observer.emit('host:detached', { name: this.name, clientId, releasedHolds })
    }
}


function isQueryKind(kind: MessageKind): boolean {

    return QUERY_MESSAGE_KINDS.some((queryKind) => queryKind === kind)
}


function errorCode(kind: MessageKind, err: Error): ErrorCode {

    if (err instanceof LockTimeoutError) {

        return 'LockTimeout'
    }

    if (err instanceof LockNotHeldError) {

        return 'LockNotHeld'
    }

    if (err instanceof DatabaseClosedError) {

        return 'Closed'
    }

    return isQueryKind(kind) ? 'QueryFailed' : 'BadRequest'
}


/**
 * Best-effort id of a request that failed validation, so the sender is
 * not left waiting.
 */
function requestId(raw: unknown): number | null {

    if (typeof raw !== 'object' || raw === null || !('id' in raw)) {

        return null
    }

    const { id } = raw

    return typeof id === 'number' && Number.isInteger(id) && id > 0 ? id : null
}
