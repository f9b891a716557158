/**
 * Cross-context message vocabulary.
 *
 * A client context talks to the host that owns the database with tagged
 * requests `{ id, kind, payload? }`. The host answers each with a response
 * carrying the same id, and pushes table updates unprompted. Everything
 * crossing the boundary is validated with Zod on arrival.
 */
import { z } from 'zod';

/**
 * Lock coordination requests.
 */
export const LOCK_MESSAGE_KINDS = [
    'requestSharedLock',
    'requestExclusiveLock',
    'releaseLock',
    'getAutoCommit',
] as const;

/**
 * Query requests, run by the host against its storage engine.
 */
export const QUERY_MESSAGE_KINDS = [
    'select',
    'execute',
    'executeBatch',
] as const;

export type LockMessageKind = typeof LOCK_MESSAGE_KINDS[number];
export type QueryMessageKind = typeof QUERY_MESSAGE_KINDS[number];
export type MessageKind = LockMessageKind | QueryMessageKind;

/**
 * Error codes a host may answer with.
 */
export const ErrorCodeSchema = z.enum([
    'LockTimeout',
    'LockNotHeld',
    'Closed',
    'BadRequest',
    'QueryFailed',
]);

export type ErrorCode = z.infer<typeof ErrorCodeSchema>;

const RequestIdSchema = z.number().int().positive();

const LockPayloadSchema = z.object({
    timeout: z.number().int().min(0).optional(),
});

const StatementPayloadSchema = z.object({
    sql: z.string(),
    params: z.array(z.unknown()),
});

/**
 * Client-to-host request.
 */
export const RequestSchema = z.discriminatedUnion('kind', [
    z.object({ id: RequestIdSchema, kind: z.literal('requestSharedLock'), payload: LockPayloadSchema.optional() }),
    z.object({ id: RequestIdSchema, kind: z.literal('requestExclusiveLock'), payload: LockPayloadSchema.optional() }),
    z.object({ id: RequestIdSchema, kind: z.literal('releaseLock') }),
    z.object({ id: RequestIdSchema, kind: z.literal('getAutoCommit') }),
    z.object({ id: RequestIdSchema, kind: z.literal('select'), payload: StatementPayloadSchema }),
    z.object({ id: RequestIdSchema, kind: z.literal('execute'), payload: StatementPayloadSchema }),
    z.object({
        id: RequestIdSchema,
        kind: z.literal('executeBatch'),
        payload: z.object({
            sql: z.string(),
            parameterSets: z.array(z.array(z.unknown())),
        }),
    }),
]);

export type Request = z.infer<typeof RequestSchema>;

/**
 * Host-to-client messages: responses and pushed updates.
 */
export const HostMessageSchema = z.union([
    z.object({
        type: z.literal('response'),
        id: RequestIdSchema,
        ok: z.literal(true),
        value: z.unknown(),
    }),
    z.object({
        type: z.literal('response'),
        id: RequestIdSchema,
        ok: z.literal(false),
        error: z.object({
            code: ErrorCodeSchema,
            message: z.string(),
        }),
    }),
    z.object({
        type: z.literal('update'),
        tables: z.array(z.string()),
    }),
]);

export type HostMessage = z.infer<typeof HostMessageSchema>;

/**
 * Response values, checked by the client per request kind.
 */
export const RowsSchema = z.array(z.record(z.unknown()));

export const ExecuteResultSchema = z.object({
    rows: RowsSchema,
    rowsAffected: z.number(),
    insertId: z.bigint().optional(),
});

export const AutoCommitSchema = z.boolean();
