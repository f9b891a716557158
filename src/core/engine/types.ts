/**
 * Storage engine types.
 *
 * The engine is the narrow seam between lock arbitration and the thing that
 * actually runs SQL. Everything above it (connections, pool, contexts, the
 * cross-context host) only ever talks to this interface.
 */

/**
 * A single result row keyed by column name.
 */
export type Row = Record<string, unknown>;

/**
 * Bound parameters for a statement.
 */
export type SqlParams = readonly unknown[];

/**
 * Result of a mutating statement.
 *
 * `rows` is only non-empty for statements that return data, such as
 * `INSERT ... RETURNING`.
 */
export interface ExecuteResult {
    rows: Row[];
    rowsAffected: number;
    insertId?: bigint;
}

/**
 * One open handle to the database.
 *
 * @example
 * ```typescript
 * const engine = await factory.open({ readOnly: false, debugName: 'app-writer' })
 *
 * await engine.execute('INSERT INTO todos (title) VALUES (?)', ['write docs'])
 * const rows = await engine.select('SELECT * FROM todos')
 *
 * await engine.dispose()
 * ```
 */
export interface StorageEngine {
    readonly readOnly: boolean;

    select(sql: string, params?: SqlParams): Promise<Row[]>;

    execute(sql: string, params?: SqlParams): Promise<ExecuteResult>;

    /**
     * Run one statement once per parameter set, in order, discarding rows.
     */
    executeBatch(sql: string, parameterSets: readonly SqlParams[]): Promise<void>;

    /**
     * True when no transaction is open on this handle.
     */
    getAutoCommit(): Promise<boolean>;

    dispose(): Promise<void>;
}

/**
 * Narrow an unknown driver row to a Row.
 */
export function isRow(value: unknown): value is Row {

    return typeof value === 'object' && value !== null && !Array.isArray(value);

}
