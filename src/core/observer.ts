/**
 * Central event system for lockstep.
 *
 * Core modules emit events, the logger (or any embedder) subscribes. This keeps
 * lock arbitration free of output concerns.
 *
 * @example
 * ```typescript
 * // In core module - emit events at key points
 * observer.emit('lock:acquired', { name: 'app-writer', mode: 'exclusive', waitedMs: 3 })
 *
 * // Subscribe to an event
 * const cleanup = observer.on('pool:grow', (data) => console.log(data.readers))
 *
 * // Pattern matching for multiple events
 * observer.on(/^lock:/, ({ event, data }) => trace(event, data))
 * ```
 */
import {
    ObserverEngine,
    type Events
} from '@logosdx/observer'


/**
 * All events emitted by lockstep core modules.
 *
 * Events are namespaced by module:
 * - `lock:*` - Mutex and arbiter acquisition/release
 * - `connection:*` - Physical connection lifecycle
 * - `pool:*` - Reader pool growth and races
 * - `host:*` - Cross-context host (worker side)
 * - `database:*` - Top-level database lifecycle
 * - `error` - Catch-all errors
 */
export interface LockstepEvents {

    // Lock
    'lock:acquiring': { name: string; mode: 'shared' | 'exclusive'; timeout?: number }
    'lock:acquired': { name: string; mode: 'shared' | 'exclusive'; waitedMs: number }
    'lock:released': { name: string; mode: 'shared' | 'exclusive' }
    'lock:timeout': { name: string; mode: 'shared' | 'exclusive'; timeout: number }

    // Connection
    'connection:open': { name: string; readOnly: boolean; durationMs: number }
    'connection:close': { name: string }
    'connection:error': { name: string; error: string }

    // Pool
    'pool:grow': { name: string; readers: number; maxReaders: number }
    'pool:race': { name: string; attempts: number }

    // Host
    'host:attached': { name: string; clientId: number }
    'host:detached': { name: string; clientId: number; releasedHolds: number }
    'host:rejected': { name: string; clientId: number; reason: string }

    // Database
    'database:initialized': { name: string; filename: string; maxReaders: number }
    'database:close': { name: string }

    // Errors
    'error': { source: string; error: Error; context?: Record<string, unknown> }
}

export type LockstepEventNames = Events<LockstepEvents>;

/**
 * Global observer instance for lockstep.
 *
 * Enable debug mode with `LOCKSTEP_DEBUG=1` to see all events as they occur.
 */
export const observer = new ObserverEngine<LockstepEvents>({
    name: 'lockstep',
    spy: process.env['LOCKSTEP_DEBUG']
        ? (action) => console.error(`[lockstep:${action.fn}] ${String(action.event)}`)
        : undefined
});

export type { ObserverEngine }
