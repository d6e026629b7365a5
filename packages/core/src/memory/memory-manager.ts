/**
 * Memory Manager
 * Facade over the store, embedding provider, search and sync services.
 * This is what the prompt layer and the CLI talk to.
 *
 * @module memory/memory-manager
 */

import { readFile } from 'node:fs/promises'
import { basename, join } from 'node:path'
import { createLogger } from '../logger.js'
import type { MemoryConfig } from '../types.js'
import { createOllamaPlugin } from './embeddings/ollama.js'
import { EmbeddingProvider } from './embeddings/provider.js'
import type { EmbeddingsPlugin } from './embeddings/types.js'
import { MemoryDb, type MemoryDbOptions } from './memory-db.js'
import { SearchService } from './search-service.js'
import { SyncService } from './sync-service.js'
import type { MemoryStatus, SearchResult, SyncEvent, SyncResult } from './types.js'

const log = createLogger('memory')

const DEFAULT_TOP_K = 5
const DEFAULT_VECTOR_WEIGHT = 0.7
const DEFAULT_TEXT_WEIGHT = 0.3

export interface MemoryManagerOptions {
  memoryDir: string
  dbPath: string
  plugin: EmbeddingsPlugin
  chunkTokens?: number
  chunkOverlap?: number
  searchTopK?: number
  vectorWeight?: number
  textWeight?: number
  watchDebounceMs?: number
  watchPolling?: boolean
  /** Capability switches passed to the store */
  db?: MemoryDbOptions
}

export class MemoryManager {
  readonly memoryDir: string

  private db: MemoryDb
  private plugin: EmbeddingsPlugin
  private embeddings: EmbeddingProvider
  private searchService: SearchService
  private syncService: SyncService
  private searchTopK: number
  private vectorWeight: number
  private textWeight: number
  private closed = false

  constructor(options: MemoryManagerOptions) {
    this.memoryDir = options.memoryDir
    this.plugin = options.plugin
    this.searchTopK = options.searchTopK ?? DEFAULT_TOP_K
    this.vectorWeight = options.vectorWeight ?? DEFAULT_VECTOR_WEIGHT
    this.textWeight = options.textWeight ?? DEFAULT_TEXT_WEIGHT

    this.db = new MemoryDb(options.dbPath, options.db)
    this.embeddings = new EmbeddingProvider({ db: this.db, plugin: options.plugin })
    this.searchService = new SearchService({ db: this.db })
    this.syncService = new SyncService({
      memoryDir: options.memoryDir,
      db: this.db,
      embeddings: this.embeddings,
      chunkTokens: options.chunkTokens,
      chunkOverlap: options.chunkOverlap,
      debounceMs: options.watchDebounceMs,
      usePolling: options.watchPolling,
    })

    this.checkIndexModel()
  }

  /**
   * Vectors from different models are not comparable. If the index was
   * built with another model, drop it so the next sync re-embeds.
   */
  private checkIndexModel(): void {
    const model = this.embeddings.modelId
    const indexedWith = this.db.getMeta('embeddingModel')
    if (indexedWith !== null && indexedWith !== model) {
      log.info({ from: indexedWith, to: model }, 'Embedding model changed, clearing index')
      this.db.clearIndex()
    }
    this.db.setMeta('embeddingModel', model)
  }

  // ============================================================
  // SYNC
  // ============================================================

  sync(): Promise<SyncResult> {
    return this.syncService.sync()
  }

  rebuild(): Promise<SyncResult> {
    return this.syncService.rebuild()
  }

  /**
   * Subscribe to completed sync passes. Returns the unsubscribe function.
   */
  onSync(listener: (event: SyncEvent) => void): () => void {
    this.syncService.on('sync', listener)
    return () => {
      this.syncService.off('sync', listener)
    }
  }

  startWatching(): void {
    this.syncService.startWatching()
  }

  stopWatching(): Promise<void> {
    return this.syncService.stopWatching()
  }

  get isWatching(): boolean {
    return this.syncService.isWatching
  }

  // ============================================================
  // RETRIEVAL
  // ============================================================

  async search(query: string, topK?: number): Promise<SearchResult[]> {
    const embedding = await this.embeddings.embed(query)
    return this.searchService.searchHybrid(query, embedding, {
      topK: topK ?? this.searchTopK,
      vectorWeight: this.vectorWeight,
      textWeight: this.textWeight,
    })
  }

  /**
   * Search results rendered as a prompt section, or '' when nothing matched.
   */
  async getContext(query: string, topK?: number): Promise<string> {
    const results = await this.search(query, topK)
    if (results.length === 0) return ''

    const parts = ['## Relevant Memory\n']
    for (const r of results) {
      parts.push(`**${r.path}** (lines ${r.startLine}-${r.endLine}):`)
      parts.push(r.snippet)
      parts.push('')
    }
    return parts.join('\n')
  }

  /**
   * Raw text of a file directly under the memory root (e.g. SOUL.md).
   * Null when it does not exist or `filename` is not a plain file name.
   */
  async getFileContent(filename: string): Promise<string | null> {
    if (!isPlainFileName(filename)) return null

    try {
      return await readFile(join(this.memoryDir, filename), 'utf-8')
    } catch (err) {
      if (isMissingFileError(err)) return null
      throw new Error(`Failed to read ${filename}: ${err instanceof Error ? err.message : String(err)}`, {
        cause: err,
      })
    }
  }

  getStatus(): MemoryStatus {
    return this.db.getStatus()
  }

  // ============================================================
  // LIFECYCLE
  // ============================================================

  /**
   * Stop watching, wait for a running sync, release the store and the
   * embeddings backend. Safe to call twice.
   */
  async close(): Promise<void> {
    if (this.closed) return
    this.closed = true

    await this.syncService.stopWatching()
    this.db.close()
    await this.plugin.cleanup()
  }
}

function isPlainFileName(name: string): boolean {
  return name !== '' && name !== '.' && name !== '..' && basename(name) === name && !name.includes('\\')
}

function isMissingFileError(err: unknown): boolean {
  if (!(err instanceof Error) || !('code' in err)) return false
  return err.code === 'ENOENT' || err.code === 'EISDIR' || err.code === 'ENOTDIR'
}

/**
 * Build a manager from loaded config. Uses the Ollama backend unless a
 * plugin is given.
 */
export function createMemoryManager(config: MemoryConfig, plugin?: EmbeddingsPlugin): MemoryManager {
  return new MemoryManager({
    memoryDir: config.dir,
    dbPath: config.dbPath,
    plugin: plugin ?? createOllamaPlugin(config.embeddings),
    chunkTokens: config.chunkTokens,
    chunkOverlap: config.chunkOverlap,
    searchTopK: config.searchTopK,
    vectorWeight: config.vectorWeight,
    textWeight: config.textWeight,
    watchDebounceMs: config.watchDebounceMs,
    watchPolling: config.watchPolling,
  })
}
