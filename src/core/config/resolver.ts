/**
 * Options resolver.
 *
 * Merges options from defaults, the environment and explicit input.
 * Explicit input wins over the environment, which wins over defaults.
 *
 * @example
 * ```typescript
 * // LOCKSTEP_maxReaders=8 in the environment
 * const options = resolveOptions({ filename: './app.db' })
 * // options.maxReaders === 8
 *
 * const pinned = resolveOptions({ filename: './app.db', maxReaders: 2 })
 * // pinned.maxReaders === 2
 * ```
 */
import { getEnvOptions } from './env.js'
import { parseOptions, type DatabaseOptions, type DatabaseOptionsInput } from './schema.js'


export interface ResolveOptions {
    /** Environment to read LOCKSTEP_* variables from. Defaults to process.env. */
    env?: NodeJS.ProcessEnv
}


/**
 * Resolve the effective database options.
 *
 * @throws ConfigValidationError if the merged options are invalid
 */
export function resolveOptions(
    input: Partial<DatabaseOptionsInput> = {},
    options: ResolveOptions = {},
): DatabaseOptions {

    const fromEnv = getEnvOptions(options.env)

    // Drop undefined keys so they don't shadow environment values
    const explicit = Object.fromEntries(
        Object.entries(input).filter(([, value]) => value !== undefined),
    )

    return parseOptions({ ...fromEnv, ...explicit })
}
