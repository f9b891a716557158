/**
 * Database module exports.
 */
export { SqliteDatabase, type SqliteDatabaseInit } from './database.js';
export { QueryMethods } from './queries.js';
