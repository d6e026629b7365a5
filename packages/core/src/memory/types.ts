/**
 * Memory System Types
 * @module memory/types
 */

// ============================================================
// FILE TRACKING
// ============================================================

export interface FileRecord {
  path: string // Relative to the memory root, '/'-separated
  hash: string // SHA256 of file content
  mtime: number // Modified time, ms since epoch
  size: number // File size in bytes
}

// ============================================================
// CHUNKS
// ============================================================

export interface Chunk {
  id: number
  path: string
  startLine: number
  endLine: number
  hash: string // SHA256 of chunk text
  model: string // Embedding model that produced `embedding`
  text: string
  embedding: number[] | null
  updatedAt: number
}

export type NewChunk = Omit<Chunk, 'id'>

// ============================================================
// SEARCH
// ============================================================

export interface SearchResult {
  chunkId: number
  path: string
  startLine: number
  endLine: number
  snippet: string // At most SNIPPET_MAX_CHARS of chunk text
  score: number // Higher is better
}

export interface HybridSearchOptions {
  topK: number
  vectorWeight: number
  textWeight: number
}

// ============================================================
// SYNC
// ============================================================

export interface SyncResult {
  added: number
  updated: number
  deleted: number
  unchanged: number
  errors: string[] // Files skipped this pass, with the reason
  duration: number // ms
}

export type SyncEvent = { type: 'full'; result: SyncResult } | { type: 'rebuild'; result: SyncResult }

// ============================================================
// STATUS
// ============================================================

export interface MemoryStatus {
  filesIndexed: number
  totalChunks: number
  cachedEmbeddings: number
  keywordSearch: boolean
  vectorSearch: boolean
  embeddingModel: string | null
  dimensions: number | null
  lastSync: string | null
}
