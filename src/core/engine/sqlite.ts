/**
 * SQLite storage engine.
 *
 * Uses better-sqlite3 for the handle and Kysely to run raw compiled queries
 * through it. Writes record the tables they touch and publish them on the
 * shared UpdateStream once the change is committed (immediately in
 * autocommit mode, at COMMIT inside a transaction, never after a full
 * ROLLBACK).
 */
import { CompiledQuery, Kysely, SqliteDialect } from 'kysely'
import Database from 'better-sqlite3'

import { affectedTable, isFullRollback, UpdateNotification, type UpdateStream } from './updates.js'
import { isRow, type ExecuteResult, type Row, type SqlParams, type StorageEngine } from './types.js'


export interface SqliteEngineOptions {
    filename: string
    readOnly: boolean

    /** How long SQLite itself waits on a busy database file, in milliseconds. */
    busyTimeout: number

    journalMode: 'wal' | 'delete'

    /** Receives change notifications from this handle's writes. */
    updates?: UpdateStream
}


export class SqliteEngine implements StorageEngine {

    readonly readOnly: boolean

    #raw: Database.Database
    #db: Kysely<unknown>
    #updates: UpdateStream | null
    #pendingTables = new Set<string>()
    #changes: Database.Statement | null = null

    constructor(options: SqliteEngineOptions) {

        this.readOnly = options.readOnly
        this.#updates = options.updates ?? null

        this.#raw = new Database(options.filename, {
            readonly: options.readOnly,
            fileMustExist: options.readOnly,
            timeout: options.busyTimeout,
        })

        if (!options.readOnly) {

            this.#raw.pragma(`journal_mode = ${options.journalMode.toUpperCase()}`)
        }

        this.#db = new Kysely<unknown>({
            dialect: new SqliteDialect({
                database: this.#raw,
            }),
        })
    }

    async select(sql: string, params: SqlParams = []): Promise<Row[]> {

        const result = await this.#db.executeQuery(CompiledQuery.raw(sql, [...params]))

        if (!this.readOnly) {

            // Transaction control may arrive here too
            this.#track(sql, false)
        }

        return result.rows.filter(isRow)
    }

    async execute(sql: string, params: SqlParams = []): Promise<ExecuteResult> {

        const result = await this.#db.executeQuery(CompiledQuery.raw(sql, [...params]))
        const rows = result.rows.filter(isRow)

        // Kysely runs RETURNING statements as readers and reports no counts
        const { rowsAffected, insertId } = result.numAffectedRows === undefined && affectedTable(sql)
            ? this.#lastChange()
            : { rowsAffected: Number(result.numAffectedRows ?? 0n), insertId: result.insertId }

        this.#track(sql, rowsAffected > 0 || rows.length > 0)

        return { rows, rowsAffected, insertId }
    }

    async executeBatch(sql: string, parameterSets: readonly SqlParams[]): Promise<void> {

        for (const params of parameterSets) {

            await this.execute(sql, params)
        }
    }

    async getAutoCommit(): Promise<boolean> {

        return !this.#raw.inTransaction
    }

    async dispose(): Promise<void> {

        await this.#db.destroy()
    }

    /**
     * Change count and rowid of the statement that just ran on this handle.
     */
    #lastChange(): Pick<ExecuteResult, 'rowsAffected' | 'insertId'> {

        this.#changes ??= this.#raw
            .prepare('SELECT changes() AS changes, last_insert_rowid() AS insertId')
            .safeIntegers(true)

        const row: unknown = this.#changes.get()

        if (!isRow(row)) {

            return { rowsAffected: 0 }
        }

        const { changes, insertId } = row

        return {
            rowsAffected: typeof changes === 'bigint' ? Number(changes) : 0,
            insertId: typeof insertId === 'bigint' ? insertId : undefined,
        }
    }

    #track(sql: string, changed: boolean): void {

        const table = changed ? affectedTable(sql) : null

        if (table) {

            this.#pendingTables.add(table)
        }

        if (isFullRollback(sql)) {

            this.#pendingTables.clear()
            return
        }

        if (this.#raw.inTransaction || this.#pendingTables.size === 0) {

            return
        }

        const update = new UpdateNotification(this.#pendingTables)
        this.#pendingTables.clear()

        this.#updates?.publish(update)
    }
}
