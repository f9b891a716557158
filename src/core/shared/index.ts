/**
 * Shared database exports.
 */
export { SharedDatabase, type SharedDatabaseOptions } from './shared-database.js';
