/**
 * Cross-context errors.
 */
import type { ErrorCode, MessageKind } from './messages.js'


/**
 * Error when the host rejects or fails a coordination message.
 *
 * Fatal to the lock attempt in flight. The caller follows up with a
 * best-effort `releaseLock`.
 *
 * @example
 * ```typescript
 * const [, err] = await attempt(() => shared.writeLock(work))
 * if (err instanceof UpstreamProtocolError) {
 *     reconnect()
 * }
 * ```
 */
export class UpstreamProtocolError extends Error {

    override readonly name = 'UpstreamProtocolError' as const

    constructor(
        public readonly kind: MessageKind,
        public readonly reason: string,
        public readonly code?: ErrorCode,
    ) {

        super(`Host rejected '${kind}': ${reason}`)
    }
}


/**
 * Error when the host ran a statement and SQLite failed it.
 */
export class RemoteQueryError extends Error {

    override readonly name = 'RemoteQueryError' as const

    constructor(
        public readonly kind: MessageKind,
        public readonly sql: string,
        message: string,
    ) {

        super(message)
    }
}
