/**
 * Pool module exports.
 */
export { ConnectionPool, type PoolOptions } from './pool.js';
