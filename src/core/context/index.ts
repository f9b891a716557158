/**
 * Context module exports.
 */
export type { ContextOwner, ReadContext, WriteContext } from './types.js';

export { CardinalityError, ContextClosedError } from './errors.js';

export { ScopedReadContext, ScopedWriteContext, withContext } from './context.js';
