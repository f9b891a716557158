/**
 * Logger Types
 *
 * The logger turns observer events into log lines on one or more
 * writable streams.
 */

/**
 * Log verbosity levels.
 *
 * - silent: No logging
 * - error: Errors only
 * - warn: Errors + warnings (lock timeouts, rejected messages)
 * - info: Errors + warnings + lifecycle (default)
 * - verbose: All events including every lock attempt
 */
export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'verbose';

export const LOG_LEVELS: readonly LogLevel[] = ['silent', 'error', 'warn', 'info', 'verbose'];

/**
 * Numeric priority for log levels.
 * Higher numbers = more verbose.
 */
export const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
    silent: 0,
    error: 1,
    warn: 2,
    info: 3,
    verbose: 4,
};

/**
 * Entry level of a single line.
 */
export type EntryLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * A single log entry, written as one JSON line in `json` format.
 *
 * @example
 * ```json
 * {
 *     "timestamp": "2024-01-15T10:30:00.000Z",
 *     "level": "warn",
 *     "event": "lock:timeout",
 *     "message": "Timed out after 10ms waiting for exclusive lock on app-writer"
 * }
 * ```
 */
export interface LogEntry {
    /** ISO 8601 timestamp */
    timestamp: string;

    level: EntryLevel;

    /** Observer event name */
    event: string;

    /** Human-readable summary */
    message: string;

    /** Event payload (included at verbose level) */
    data?: Record<string, unknown>;

    /** Context attached to every entry (process role, database name...) */
    context?: Record<string, unknown>;
}

/**
 * `text`: `[timestamp] [LEVEL] [event] message`. `json`: one LogEntry per line.
 */
export type LogFormat = 'text' | 'json';

export interface LoggerConfig {
    level: LogLevel;
    format: LogFormat;
}

export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
    level: 'info',
    format: 'text',
};

/**
 * Logger state for lifecycle management.
 */
export type LoggerState = 'idle' | 'running' | 'stopped';
