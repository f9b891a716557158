/**
 * Logger
 *
 * Stream-based logger that subscribes to every observer event and writes
 * the ones passing the configured level to its streams, either as compact
 * text lines or as JSON entries.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ level: 'warn', streams: [process.stderr] })
 * logger.start()
 *
 * // lock:timeout, host:rejected and every error now reach stderr
 *
 * logger.stop()
 * ```
 */
import type { Writable } from 'node:stream';

import { getEnvLogLevel } from '../config/env.js';
import { isCi } from '../environment.js';
import { observer } from '../observer.js';
import { classifyEvent, shouldLog } from './classifier.js';
import { formatEntry, generateMessage, serializeEntry } from './formatter.js';
import type { EntryLevel, LogFormat, LoggerConfig, LoggerState, LogLevel } from './types.js';
import { DEFAULT_LOGGER_CONFIG, LOG_LEVEL_PRIORITY, LOG_LEVELS } from './types.js';

/**
 * Options for Logger construction.
 */
export interface LoggerOptions {
    /** Minimum level to write. Defaults to LOCKSTEP_LOG_LEVEL, then 'info'. */
    level?: LogLevel;

    /** Defaults to 'text' in CI or when output is piped, 'json' otherwise. */
    format?: LogFormat;

    /** Where lines go. Defaults to stderr. */
    streams?: Writable[];

    /** Included with every JSON entry. */
    context?: Record<string, unknown>;
}

interface ObservedEvent {
    event: string;
    data: Record<string, unknown>;
}

/**
 * Logger that captures observer events and writes them to streams.
 */
export class Logger {

    #config: LoggerConfig;
    #context: Record<string, unknown>;
    #streams: Writable[];
    #state: LoggerState = 'idle';
    #cleanup: (() => void) | null = null;

    constructor(options: LoggerOptions = {}) {

        this.#config = {
            level: options.level ?? envLevel() ?? DEFAULT_LOGGER_CONFIG.level,
            format: options.format ?? (isCi() ? 'text' : 'json'),
        };
        this.#context = options.context ?? {};
        this.#streams = options.streams ?? [process.stderr];

    }

    get state(): LoggerState {

        return this.#state;

    }

    get level(): LogLevel {

        return this.#config.level;

    }

    get format(): LogFormat {

        return this.#config.format;

    }

    get isEnabled(): boolean {

        return this.#config.level !== 'silent';

    }

    /**
     * Update the logging context.
     *
     * Context is included with every JSON entry.
     */
    setContext(context: Record<string, unknown>): void {

        this.#context = { ...this.#context, ...context };

    }

    /**
     * Begin capturing events. No-op when already running or silent.
     */
    start(): void {

        if (this.#state === 'running' || !this.isEnabled) {

            return;

        }

        this.#cleanup = observer.on(/./, (payload: unknown) => {

            if (isObservedEvent(payload)) {

                this.#handleEvent(payload.event, payload.data);

            }

        });

        this.#state = 'running';

    }

    /**
     * Stop capturing events. Streams are left open; they belong to the
     * caller.
     */
    stop(): void {

        if (this.#state !== 'running') {

            return;

        }

        this.#cleanup?.();
        this.#cleanup = null;
        this.#state = 'stopped';

    }

    #handleEvent(event: string, data: Record<string, unknown>): void {

        if (!shouldLog(event, this.#config.level)) {

            return;

        }

        if (this.#config.format === 'text') {

            this.#writeLine(classifyEvent(event), `[${event}] ${generateMessage(event, data)}`);
            return;

        }

        const includeData = this.#config.level === 'verbose';
        const entry = formatEntry(event, data, this.#context, includeData);

        this.#write(serializeEntry(entry));

    }

    // ─────────────────────────────────────────────────────────────
    // Direct logging methods
    // ─────────────────────────────────────────────────────────────

    info(message: string): void {

        this.#log('info', message);

    }

    warn(message: string): void {

        this.#log('warn', message);

    }

    error(message: string): void {

        this.#log('error', message);

    }

    debug(message: string): void {

        this.#log('debug', message);

    }

    #log(level: EntryLevel, message: string): void {

        if (this.#state !== 'running') {

            return;

        }

        const entryPriority = level === 'debug' ? LOG_LEVEL_PRIORITY.verbose : LOG_LEVEL_PRIORITY[level];

        if (entryPriority > LOG_LEVEL_PRIORITY[this.#config.level]) {

            return;

        }

        this.#writeLine(level, message);

    }

    #writeLine(level: EntryLevel, message: string): void {

        const timestamp = new Date().toISOString();
        const levelLabel = level.toUpperCase().padEnd(5);

        this.#write(`[${timestamp}] [${levelLabel}] ${message}\n`);

    }

    #write(line: string): void {

        for (const stream of this.#streams) {

            stream.write(line);

        }

    }

}

function isObservedEvent(payload: unknown): payload is ObservedEvent {

    if (typeof payload !== 'object' || payload === null) {

        return false;

    }

    if (!('event' in payload) || !('data' in payload)) {

        return false;

    }

    const { event, data } = payload;

    return typeof event === 'string' && typeof data === 'object' && data !== null;

}

function envLevel(): LogLevel | undefined {

    const requested = getEnvLogLevel();

    return LOG_LEVELS.find((level) => level === requested);

}

// ─────────────────────────────────────────────────────────────
// Singleton / Factory
// ─────────────────────────────────────────────────────────────

let loggerInstance: Logger | null = null;

/**
 * Get or create the shared Logger. The first call with options creates it.
 */
export function getLogger(options?: LoggerOptions): Logger | null {

    if (!loggerInstance && options) {

        loggerInstance = new Logger(options);

    }

    return loggerInstance;

}

/**
 * Stop and drop the shared Logger.
 */
export function resetLogger(): void {

    if (loggerInstance) {

        loggerInstance.stop();
        loggerInstance = null;

    }

}
