/**
 * Environment variable configuration.
 *
 * Database options can be overridden via LOCKSTEP_* environment variables.
 * Uses makeNestedConfig to turn the flat variables into an options object.
 * All-caps names are lowercased, so camelCase options are written as-is:
 *
 * @example
 * ```bash
 * LOCKSTEP_FILENAME=./data/app.db
 * LOCKSTEP_maxReaders=8
 * LOCKSTEP_lockTimeout=2000
 * LOCKSTEP_busyTimeout=5000
 * LOCKSTEP_debugName=app
 * LOCKSTEP_journalMode=wal
 * ```
 */
import { makeNestedConfig } from '@logosdx/utils'

import { ConfigValidationError, PartialDatabaseOptionsSchema, type PartialDatabaseOptions } from './schema.js'


/**
 * Meta env vars that control runtime behavior, not option values.
 * These are excluded from makeNestedConfig processing.
 */
const META_ENV_VARS = new Set([
    'LOCKSTEP_DEBUG',      // Observer spy output
    'LOCKSTEP_LOG_LEVEL',  // Logger verbosity
    'LOCKSTEP_HEADLESS',   // Logger output format
])


/**
 * Read database options from environment variables.
 *
 * @throws ConfigValidationError if a variable holds an invalid value
 */
export function getEnvOptions(env: NodeJS.ProcessEnv = process.env): PartialDatabaseOptions {

    const { allConfigs } = makeNestedConfig<PartialDatabaseOptions>(
        definedVars(env),
        {
            filter: (key) => key.startsWith('LOCKSTEP_') && !META_ENV_VARS.has(key),
            stripPrefix: 'LOCKSTEP_',
            forceAllCapToLower: true,
            skipConversion: (key) => key.toLowerCase().includes('filename'),
        }
    )

    const result = PartialDatabaseOptionsSchema.safeParse(allConfigs())

    if (!result.success) {

        const firstIssue = result.error.issues[0]
        const field = firstIssue?.path.join('.') || 'unknown'

        throw new ConfigValidationError(
            `Invalid LOCKSTEP_${field}: ${firstIssue?.message ?? 'validation failed'}`,
            field,
            result.error.issues,
        )
    }

    return result.data
}


/**
 * Drop unset variables; makeNestedConfig only takes string values.
 */
function definedVars(env: NodeJS.ProcessEnv): Record<string, string> {

    const vars: Record<string, string> = {}

    for (const [key, value] of Object.entries(env)) {

        if (value !== undefined) {

            vars[key] = value
        }
    }

    return vars
}


/**
 * Log level requested through LOCKSTEP_LOG_LEVEL, if any.
 */
export function getEnvLogLevel(env: NodeJS.ProcessEnv = process.env): string | undefined {

    return env['LOCKSTEP_LOG_LEVEL']
}
