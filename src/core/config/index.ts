/**
 * Config module - database options for lockstep.
 *
 * Handles option validation and merging from defaults, environment
 * variables and explicit input.
 */

// Schema & Validation
export {
    DatabaseOptionsSchema,
    PartialDatabaseOptionsSchema,
    JournalModeSchema,
    ConfigValidationError,
    parseOptions,
    type DatabaseOptions,
    type DatabaseOptionsInput,
    type PartialDatabaseOptions,
} from './schema.js';

// Resolver
export { resolveOptions, type ResolveOptions } from './resolver.js';

// Environment variables
export { getEnvOptions, getEnvLogLevel } from './env.js';
