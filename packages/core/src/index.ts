/**
 * @kb-sync/core
 *
 * Incremental knowledge-base sync engine: JSON documents become chunks, chunks
 * are diffed against a SQLite state store, and changes are pushed to a vector index.
 */

export * from './kb/index.js'
export * from './config/index.js'
export * from './storage/index.js'
export * from './common/index.js'
