/**
 * sqlite-lockstep
 *
 * Single-writer, multi-reader SQLite access for many concurrent callers,
 * in one thread or across worker threads.
 *
 * @example
 * ```typescript
 * import { SqliteDatabase } from 'sqlite-lockstep'
 *
 * const db = await SqliteDatabase.open({ filename: './app.db' })
 *
 * await db.writeTransaction(async (tx) => {
 *     await tx.execute('INSERT INTO todos (title) VALUES (?)', ['write docs'])
 * })
 *
 * const todos = await db.getAll('SELECT * FROM todos')
 * ```
 */
export * from './core/index.js'
