/**
 * Connection module exports.
 *
 * Provides the connection factory and the single-handle Connection the
 * pool is built from.
 */
export { createSqliteFactory, isTransientOpenError } from './factory.js';
export { Connection, remaining, type ClaimOutcome, type ConnectionOptions } from './connection.js';
export * from './types.js';
