/**
 * Engine module exports.
 *
 * The storage engine runs SQL on one physical handle and publishes table
 * change notifications.
 */
export type { ExecuteResult, Row, SqlParams, StorageEngine } from './types.js';
export { isRow } from './types.js';

export { SqliteEngine, type SqliteEngineOptions } from './sqlite.js';

export {
    UpdateNotification,
    UpdateStream,
    affectedTable,
    isFullRollback,
    type SubscribeOptions,
} from './updates.js';
