/**
 * Mutex module exports.
 */
export { Mutex, type MutexOptions } from './mutex.js';
