/**
 * Log Formatter
 *
 * Converts observer events into messages and LogEntry objects. Each
 * serialized entry is a single JSON line.
 */
import { attemptSync } from '@logosdx/utils'

import type { LogEntry } from './types.js'
import { classifyEvent } from './classifier.js'


/**
 * Human-readable message templates for common events.
 * Keys are event names, values are functions that generate messages from event data.
 */
const MESSAGE_TEMPLATES: Record<string, (data: Record<string, unknown>) => string> = {

    // Lock
    'lock:acquiring': (d) => `Requesting ${d['mode']} lock on ${d['name']}`,
    'lock:acquired': (d) => `Granted ${d['mode']} lock on ${d['name']} after ${d['waitedMs']}ms`,
    'lock:released': (d) => `Released ${d['mode']} lock on ${d['name']}`,
    'lock:timeout': (d) => `Timed out after ${d['timeout']}ms waiting for ${d['mode']} lock on ${d['name']}`,

    // Connection
    'connection:open': (d) => `Opened ${d['readOnly'] ? 'read-only' : 'writable'} connection ${d['name']} (${d['durationMs']}ms)`,
    'connection:close': (d) => `Closed connection ${d['name']}`,
    'connection:error': (d) => `Connection error for ${d['name']}: ${d['error']}`,

    // Pool
    'pool:grow': (d) => `Pool ${d['name']} grew to ${d['readers']}/${d['maxReaders']} readers`,
    'pool:race': (d) => `Pool ${d['name']} raced ${d['attempts']} readers`,

    // Host
    'host:attached': (d) => `Client ${d['clientId']} attached to ${d['name']}`,
    'host:detached': (d) => `Client ${d['clientId']} detached from ${d['name']} (released ${d['releasedHolds']} holds)`,
    'host:rejected': (d) => `Rejected message from client ${d['clientId']} on ${d['name']}: ${d['reason']}`,

    // Database
    'database:initialized': (d) => `Database ${d['name']} ready at ${d['filename']} (max ${d['maxReaders']} readers)`,
    'database:close': (d) => `Database ${d['name']} closed`,

    // Generic error
    'error': (d) => `Error in ${d['source']}: ${d['error'] instanceof Error ? d['error'].message : String(d['error'])}`,
}


/**
 * Generate a human-readable message for an event.
 *
 * Uses templates for known events, falls back to generic format.
 *
 * @param event - Observer event name
 * @param data - Event payload
 * @returns Human-readable message
 */
export function generateMessage(event: string, data: Record<string, unknown>): string {

    const template = MESSAGE_TEMPLATES[event]

    if (template) {

        return template(data)
    }

    // Generic format: "Event occurred" or "Event: key=value, ..."
    const parts = Object.entries(data)
        .slice(0, 3)
        .map(([k, v]) => `${k}=${summarizeValue(v)}`)

    if (parts.length === 0) {

        return event.replace(/:/g, ' ')
    }

    return `${event.replace(/:/g, ' ')}: ${parts.join(', ')}`
}


/**
 * Summarize a value for log message display.
 * Truncates long strings and formats objects.
 */
function summarizeValue(value: unknown): string {

    if (value === null || value === undefined) {

        return String(value)
    }

    if (typeof value === 'string') {

        if (value.length > 50) {

            return `"${value.slice(0, 47)}..."`
        }

        return `"${value}"`
    }

    if (typeof value === 'number' || typeof value === 'boolean') {

        return String(value)
    }

    if (Array.isArray(value)) {

        return `[${value.length} items]`
    }

    if (typeof value === 'object') {

        return `{${Object.keys(value).length} keys}`
    }

    return String(value)
}


/**
 * Format an event into a LogEntry.
 *
 * @param event - Observer event name
 * @param data - Event payload
 * @param context - Additional context (database name, role...)
 * @param includeData - Whether to include full payload (verbose mode)
 * @returns Formatted log entry
 *
 * @example
 * ```typescript
 * const entry = formatEntry('pool:grow', { name: 'app', readers: 2, maxReaders: 4 }, { role: 'main' }, true)
 * // {
 * //     timestamp: '2024-01-15T10:30:00.000Z',
 * //     level: 'info',
 * //     event: 'pool:grow',
 * //     message: 'Pool app grew to 2/4 readers',
 * //     data: { name: 'app', readers: 2, maxReaders: 4 },
 * //     context: { role: 'main' }
 * // }
 * ```
 */
export function formatEntry(
    event: string,
    data: Record<string, unknown>,
    context?: Record<string, unknown>,
    includeData = false
): LogEntry {

    const entry: LogEntry = {
        timestamp: new Date().toISOString(),
        level: classifyEvent(event),
        event,
        message: generateMessage(event, data),
    }

    // Include full data at verbose level
    if (includeData && Object.keys(data).length > 0) {

        entry.data = sanitizeData(data)
    }

    // Include context if provided
    if (context && Object.keys(context).length > 0) {

        entry.context = context
    }

    return entry
}


/**
 * Make event data JSON-safe.
 * Errors become plain objects and bigints become strings.
 */
function sanitizeData(data: Record<string, unknown>): Record<string, unknown> {

    const result: Record<string, unknown> = {}

    for (const [key, value] of Object.entries(data)) {

        if (value instanceof Error) {

            result[key] = {
                name: value.name,
                message: value.message,
                stack: value.stack?.split('\n').slice(0, 3).join('\n'),
            }
            continue
        }

        if (typeof value === 'bigint') {

            result[key] = value.toString()
            continue
        }

        const [, err] = attemptSync(() => JSON.stringify(value))

        result[key] = err ? String(value) : value
    }

    return result
}


/**
 * Serialize a LogEntry to a JSON line.
 *
 * @param entry - Log entry to serialize
 * @returns JSON string with newline
 */
export function serializeEntry(entry: LogEntry): string {

    return JSON.stringify(entry) + '\n'
}
