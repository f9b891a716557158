/**
 * Logger Module
 *
 * Captures observer events and writes them to streams.
 */

// Types
export type {
    LogLevel,
    EntryLevel,
    LogEntry,
    LogFormat,
    LoggerConfig,
    LoggerState,
} from './types.js';

export { LOG_LEVELS, LOG_LEVEL_PRIORITY, DEFAULT_LOGGER_CONFIG } from './types.js';

// Classifier
export { classifyEvent, shouldLog } from './classifier.js';

// Formatter
export { generateMessage, formatEntry, serializeEntry } from './formatter.js';

// Logger
export { Logger, getLogger, resetLogger, type LoggerOptions } from './logger.js';
