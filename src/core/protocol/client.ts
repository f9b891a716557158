/**
 * Caller side of the cross-context protocol.
 *
 * Turns lock grants and queries into request/response round-trips over a
 * MessagePort to the host that owns the database. The client keeps no lock
 * state of its own: the host's arbiter decides, the client only waits for
 * the answer. The port itself is the holder identity on the host side.
 *
 * @example
 * ```typescript
 * const client = new CoordinationClient(host.connect(), { name: 'tab-2' })
 *
 * await client.acquire('tab-2', 'exclusive', { timeout: 1_000 })
 * await client.execute('UPDATE todos SET done = 1 WHERE id = ?', [7])
 * await client.release('tab-2')
 *
 * client.close()
 * ```
 */
import type { MessagePort } from 'node:worker_threads'
import type { z } from 'zod'

import { isRow, type ExecuteResult, type Row, type SqlParams, type StorageEngine } from '../engine/types.js'
import { UpdateNotification, UpdateStream } from '../engine/updates.js'
import { LockTimeoutError } from '../lock/errors.js'
import type { HolderId, LockGate, LockMode, LockOptions } from '../lock/types.js'
import { observer } from '../observer.js'
import { RemoteQueryError, UpstreamProtocolError } from './errors.js'
import {
    AutoCommitSchema,
    ExecuteResultSchema,
    HostMessageSchema,
    RowsSchema,
    type ErrorCode,
    type HostMessage,
    type MessageKind,
    type Request,
} from './messages.js'


export interface CoordinationClientOptions {
    /** Label used in events and errors. */
    name?: string
}

/**
 * A request without its id; the client assigns one.
 */
type Outgoing = Request extends infer R ? R extends unknown ? Omit<R, 'id'> : never : never

interface PendingRequest {
    kind: MessageKind
    resolve: (value: unknown) => void
    reject: (err: HostFailure) => void
}

/**
 * An error answer from the host, before it is mapped to a public error.
 */
class HostFailure extends Error {

    constructor(
        public readonly code: ErrorCode | 'Disconnected',
        message: string,
    ) {

        super(message)
    }
}


export class CoordinationClient implements LockGate, StorageEngine {

    readonly readOnly = false
    readonly name: string
    readonly updates: UpdateStream

    #port: MessagePort
    #nextId = 1
    #pending = new Map<number, PendingRequest>()
    #closed = false

    constructor(port: MessagePort, options: CoordinationClientOptions = {}) {

        this.name = options.name ?? 'client'
        this.updates = new UpdateStream(`${this.name}-updates`)
        this.#port = port

        port.on('message', (message: unknown) => this.#onMessage(message))
        port.on('close', () => this.#onClose())
    }

    get closed(): boolean {

        return this.#closed
    }

    /**
     * Number of requests awaiting an answer.
     */
    get inFlight(): number {

        return this.#pending.size
    }

    // ─────────────────────────────────────────────────────────────
    // Lock coordination
    // ─────────────────────────────────────────────────────────────

    /**
     * Ask the host for a grant. Resolves once granted.
     *
     * @throws LockTimeoutError if the host gave up after `options.timeout`
     * @throws UpstreamProtocolError for any other refusal
     */
    async acquire(_holder: HolderId, mode: LockMode, options: LockOptions = {}): Promise<void> {

        const payload = options.timeout === undefined ? {} : { timeout: Math.ceil(options.timeout) }
        const request: Outgoing = mode === 'shared'
            ? { kind: 'requestSharedLock', payload }
            : { kind: 'requestExclusiveLock', payload }

        try {

            await this.#request(request)
        }
        catch (err) {

            if (err instanceof HostFailure && err.code === 'LockTimeout') {

                throw new LockTimeoutError(mode, options.timeout ?? 0, this.name)
            }

            throw toProtocolError(request.kind, err)
        }
    }

    /**
     * Give back one grant.
     *
     * @throws UpstreamProtocolError if the host refused
     */
    async release(_holder?: HolderId): Promise<void> {

        try {

            await this.#request({ kind: 'releaseLock' })
        }
        catch (err) {

            throw toProtocolError('releaseLock', err)
        }
    }

    async getAutoCommit(): Promise<boolean> {

        try {

            return AutoCommitSchema.parse(await this.#request({ kind: 'getAutoCommit' }))
        }
        catch (err) {

            throw toProtocolError('getAutoCommit', err)
        }
    }

    // ─────────────────────────────────────────────────────────────
    // Queries
    // ─────────────────────────────────────────────────────────────

    async select(sql: string, params: SqlParams = []): Promise<Row[]> {

        const value = await this.#query({ kind: 'select', payload: { sql, params: [...params] } }, sql)

        return parseValue('select', RowsSchema, value).filter(isRow)
    }

    async execute(sql: string, params: SqlParams = []): Promise<ExecuteResult> {

        const value = await this.#query({ kind: 'execute', payload: { sql, params: [...params] } }, sql)

        return parseValue('execute', ExecuteResultSchema, value)
    }

    /**
     * Runs the whole batch on the host in one round-trip; no rows come
     * back.
     */
    async executeBatch(sql: string, parameterSets: readonly SqlParams[]): Promise<void> {

        await this.#query({
            kind: 'executeBatch',
            payload: { sql, parameterSets: parameterSets.map((set) => [...set]) },
        }, sql)
    }

    /**
     * Disconnect from the host. The host releases anything this client
     * still holds; the database itself stays open.
     */
    async dispose(): Promise<void> {

        this.close()
    }

    close(): void {

        if (this.#closed) {

            return
        }

        this.#port.close()
        this.#onClose()
    }

    // ─────────────────────────────────────────────────────────────
    // Private helpers
    // ─────────────────────────────────────────────────────────────

    async #query(request: Outgoing, sql: string): Promise<unknown> {

        try {

            return await this.#request(request)
        }
        catch (err) {

            if (err instanceof HostFailure && err.code === 'QueryFailed') {

                throw new RemoteQueryError(request.kind, sql, err.message)
            }

            throw toProtocolError(request.kind, err)
        }
    }

    #request(request: Outgoing): Promise<unknown> {

        if (this.#closed) {

            return Promise.reject(new HostFailure('Disconnected', 'client is closed'))
        }

        const id = this.#nextId++

        return new Promise((resolve, reject) => {

            this.#pending.set(id, { kind: request.kind, resolve, reject })
            this.#port.postMessage({ ...request, id })
        })
    }

    #onMessage(raw: unknown): void {

        const parsed = HostMessageSchema.safeParse(raw)

        if (!parsed.success) {

            observer.emit('error', {
                source: 'protocol',
                error: new Error('Ignoring malformed message from host'),
                context: { client: this.name },
            })
            return
        }

        const message: HostMessage = parsed.data

        if (message.type === 'update') {

            this.updates.publish(new UpdateNotification(message.tables))
            return
        }

        const pending = this.#pending.get(message.id)

        if (!pending) {

            return
        }

        this.#pending.delete(message.id)

        if (message.ok) {

            pending.resolve(message.value)
        }
        else {

            pending.reject(new HostFailure(message.error.code, message.error.message))
        }
    }

    #onClose(): void {

        this.#closed = true

        for (const [id, pending] of this.#pending) {

            this.#pending.delete(id)
            pending.reject(new HostFailure('Disconnected', 'connection to host closed'))
        }
    }
}


function toProtocolError(kind: MessageKind, err: unknown): UpstreamProtocolError {

    if (err instanceof UpstreamProtocolError) {

        return err
    }

    if (err instanceof HostFailure) {

        return new UpstreamProtocolError(
            kind,
            err.message,
            err.code === 'Disconnected' ? undefined : err.code,
        )
    }

    return new UpstreamProtocolError(kind, err instanceof Error ? err.message : String(err))
}


function parseValue<S extends z.ZodTypeAny>(kind: MessageKind, schema: S, value: unknown): z.output<S> {

    const result = schema.safeParse(value)

    if (!result.success) {

        throw new UpstreamProtocolError(kind, 'unexpected response shape')
    }

    return result.data
}
