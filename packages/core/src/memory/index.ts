/**
 * Memory System
 * Markdown notes indexed in SQLite for hybrid vector + keyword search.
 *
 * @module memory
 */

export * from './types.js'
export * from './vector-codec.js'
export * from './memory-db.js'
export * from './chunker.js'
export * from './sync-service.js'
export * from './search-service.js'
export * from './memory-manager.js'
export * from './init.js'
export * from './daily-log.js'
export * from './embeddings/index.js'
