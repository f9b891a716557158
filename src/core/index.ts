/**
 * Core module exports.
 *
 * Everything public lives behind this barrel; `src/index.ts` re-exports it.
 */

// Observer
export { observer } from './observer.js'
export type { LockstepEvents, LockstepEventNames, ObserverEngine } from './observer.js'

// Config
export * from './config/index.js'

// Locks
export * from './mutex/index.js'
export * from './lock/index.js'

// Storage
export * from './engine/index.js'
export * from './context/index.js'
export * from './connection/index.js'
export * from './pool/index.js'

// Databases
export * from './database/index.js'
export * from './shared/index.js'

// Cross-context
export * from './protocol/index.js'

// Logger
export * from './logger/index.js'
export { isCi } from './environment.js'
