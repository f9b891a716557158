/**
 * Database options Zod schemas and validation.
 *
 * Uses Zod for declarative validation with readable error messages and
 * type inference.
 */
import { z } from 'zod';

/**
 * Journal modes the engine knows how to set up.
 */
export const JournalModeSchema = z.enum(['wal', 'delete']);

/**
 * Millisecond durations. Environment values arrive as strings.
 */
const DurationSchema = z.coerce
    .number()
    .int('Durations must be whole milliseconds')
    .min(0, 'Durations cannot be negative');

/**
 * Full options schema with defaults applied.
 *
 * A pool needs a file every reader can open; `:memory:` would give each
 * connection its own private database.
 */
export const DatabaseOptionsSchema = z.object({
    filename: z
        .string()
        .min(1, 'Database filename is required')
        .refine((f) => f !== ':memory:', {
            message: 'In-memory databases cannot be shared between pooled connections',
        }),
    maxReaders: z.coerce
        .number()
        .int()
        .min(1, 'At least one reader is required')
        .max(64, 'At most 64 readers are supported')
        .default(5),
    lockTimeout: DurationSchema.optional(),
    busyTimeout: DurationSchema.default(5_000),
    debugName: z.string().min(1).optional(),
    journalMode: JournalModeSchema.default('wal'),
});

/**
 * Partial options (all fields optional), as read from the environment.
 */
export const PartialDatabaseOptionsSchema = z.object({
    filename: z.string().optional(),
    maxReaders: z.coerce.number().int().optional(),
    lockTimeout: DurationSchema.optional(),
    busyTimeout: DurationSchema.optional(),
    debugName: z.string().optional(),
    journalMode: JournalModeSchema.optional(),
});

// ─────────────────────────────────────────────────────────────
// Type Exports
// ─────────────────────────────────────────────────────────────

export type DatabaseOptions = z.output<typeof DatabaseOptionsSchema>;
export type DatabaseOptionsInput = z.input<typeof DatabaseOptionsSchema>;
export type PartialDatabaseOptions = z.output<typeof PartialDatabaseOptionsSchema>;

// ─────────────────────────────────────────────────────────────
// Validation Functions
// ─────────────────────────────────────────────────────────────

/**
 * Error thrown when options validation fails.
 *
 * Includes the specific field that failed and all validation issues.
 */
export class ConfigValidationError extends Error {

    constructor(
        message: string,
        public readonly field: string,
        public readonly issues: z.ZodIssue[],
    ) {

        super(message);
        this.name = 'ConfigValidationError';

    }

}

/**
 * Parse and validate options, returning defaults for missing fields.
 *
 * @throws ConfigValidationError if validation fails
 *
 * @example
 * ```typescript
 * const options = parseOptions({ filename: './app.db' })
 * // options.maxReaders === 5 (default)
 * // options.journalMode === 'wal' (default)
 * ```
 */
export function parseOptions(input: unknown): DatabaseOptions {

    const result = DatabaseOptionsSchema.safeParse(input);

    if (!result.success) {

        const firstIssue = result.error.issues[0];

        throw new ConfigValidationError(
            firstIssue?.message ?? 'Validation failed',
            firstIssue?.path.join('.') || 'unknown',
            result.error.issues,
        );

    }

    return result.data;

}
