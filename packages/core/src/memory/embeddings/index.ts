/**
 * Embeddings
 * @module memory/embeddings
 */

export * from './types.js'
export * from './ollama.js'
export * from './provider.js'
