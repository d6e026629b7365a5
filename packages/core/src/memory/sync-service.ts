/**
 * File Sync Service
 * Brings the memory index in line with the Markdown files on disk, and
 * optionally watches the memory directory to resync on change.
 *
 * Every full sync runs under one mutex, so a watcher-triggered sync never
 * overlaps a manual one.
 *
 * @module memory/sync-service
 */

import { EventEmitter } from 'node:events'
import { existsSync } from 'node:fs'
import { readFile, stat } from 'node:fs/promises'
import { basename, join } from 'node:path'
import { watch, type FSWatcher } from 'chokidar'
import { globby } from 'globby'
import { createLogger } from '../logger.js'
import { Mutex } from '../utils/mutex.js'
import { chunkMarkdown, hashFileContent } from './chunker.js'
import type { EmbeddingProvider } from './embeddings/provider.js'
import type { MemoryDb } from './memory-db.js'
import type { FileRecord, SyncEvent, SyncResult } from './types.js'

const log = createLogger('sync')

const utf8 = new TextDecoder('utf-8', { fatal: true })

const DEFAULT_DEBOUNCE_MS = 5000
const POLL_INTERVAL_MS = 1000

export interface SyncServiceOptions {
  memoryDir: string
  db: MemoryDb
  embeddings: EmbeddingProvider
  chunkTokens?: number
  chunkOverlap?: number
  debounceMs?: number
  /** Poll instead of native fs events (network drives, WSL2) */
  usePolling?: boolean
}

export class SyncService extends EventEmitter {
  private memoryDir: string
  private db: MemoryDb
  private embeddings: EmbeddingProvider
  private chunkTokens: number | undefined
  private chunkOverlap: number | undefined
  private debounceMs: number
  private usePolling: boolean
  private watcher: FSWatcher | null = null
  private debounceTimer: ReturnType<typeof setTimeout> | null = null
  private mutex = new Mutex()

  constructor(options: SyncServiceOptions) {
    super()
    this.memoryDir = options.memoryDir
    this.db = options.db
    this.embeddings = options.embeddings
    this.chunkTokens = options.chunkTokens
    this.chunkOverlap = options.chunkOverlap
    this.debounceMs = options.debounceMs ?? DEFAULT_DEBOUNCE_MS
    this.usePolling = options.usePolling ?? false
  }

  // ============================================================
  // SYNC
  // ============================================================

  /**
   * Perform a full sync of every Markdown file under the memory directory.
   * Waits for any sync already in progress.
   */
  sync(): Promise<SyncResult> {
    return this.mutex.runExclusive(async () => {
      const result = await this.runSync()
      this.emitSync({ type: 'full', result })
      return result
    })
  }

  /**
   * Clear the index (embedding cache kept) and sync from scratch.
   */
  rebuild(): Promise<SyncResult> {
    return this.mutex.runExclusive(async () => {
      this.db.clearIndex()
      const result = await this.runSync()
      this.emitSync({ type: 'rebuild', result })
      return result
    })
  }

  get isSyncing(): boolean {
    return this.mutex.isLocked
  }

  private async runSync(): Promise<SyncResult> {
    const startTime = Date.now()
    const result: SyncResult = {
      added: 0,
      updated: 0,
      deleted: 0,
      unchanged: 0,
      errors: [],
      duration: 0,
    }

    const files = await this.discoverFiles()
    const onDisk = new Set(files)
    const indexed = new Map(this.db.listFiles().map((f) => [f.path, f]))

    // Remove files that no longer exist
    for (const path of indexed.keys()) {
      if (onDisk.has(path)) continue
      this.db.transaction(() => {
        this.db.deleteChunksForFile(path)
        this.db.deleteFile(path)
      })
      result.deleted++
    }

    for (const relativePath of files) {
      const filePath = join(this.memoryDir, relativePath)

      let bytes: Buffer
      let size: number
      let mtime: number
      try {
        bytes = await readFile(filePath)
        const fileStat = await stat(filePath)
        size = fileStat.size
        mtime = fileStat.mtimeMs
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err)
        log.warn({ path: relativePath, err: message }, 'Skipping unreadable file')
        result.errors.push(`${relativePath}: ${message}`)
        continue
      }

      let content: string
      try {
        content = utf8.decode(bytes)
      } catch (err) {
        if (!(err instanceof TypeError)) throw err
        log.warn({ path: relativePath }, 'Skipping file with invalid UTF-8')
        result.errors.push(`${relativePath}: invalid UTF-8`)
        continue
      }

      const hash = hashFileContent(bytes)
      const existing = indexed.get(relativePath)
      if (existing && existing.hash === hash) {
        result.unchanged++
        continue
      }

      await this.indexFile({ path: relativePath, hash, mtime, size }, content)

      if (existing) {
        result.updated++
      } else {
        result.added++
      }
    }

    this.db.setMeta('lastSync', new Date().toISOString())
    result.duration = Date.now() - startTime

    log.info(
      {
        added: result.added,
        updated: result.updated,
        deleted: result.deleted,
        unchanged: result.unchanged,
        errors: result.errors.length,
        duration: result.duration,
      },
      'Sync complete',
    )
    return result
  }

  /**
   * Replace the chunks of one file. Embeddings are computed before the
   * transaction opens; the old chunks, new chunks and file row change
   * together or not at all.
   */
  private async indexFile(file: FileRecord, content: string): Promise<void> {
    const chunks = chunkMarkdown(content, {
      chunkTokens: this.chunkTokens,
      overlapTokens: this.chunkOverlap,
    })
    const vectors = await this.embeddings.embedBatch(chunks.map((c) => c.text))

    const first = vectors[0]
    if (first) {
      this.db.ensureVectorTable(first.length)
    }

    const model = this.embeddings.modelId
    const now = Date.now()
    this.db.transaction(() => {
      this.db.deleteChunksForFile(file.path)
      chunks.forEach((chunk, i) => {
        this.db.insertChunk({
          path: file.path,
          startLine: chunk.startLine,
          endLine: chunk.endLine,
          hash: chunk.hash,
          model,
          text: chunk.text,
          embedding: vectors[i] ?? null,
          updatedAt: now,
        })
      })
      this.db.upsertFile(file)
    })

    log.debug({ path: file.path, chunks: chunks.length }, 'Indexed file')
  }

  /**
   * Relative, '/'-separated paths of every non-hidden .md file, sorted.
   */
  private async discoverFiles(): Promise<string[]> {
    if (!existsSync(this.memoryDir)) return []
    const files = await globby('**/*.md', { cwd: this.memoryDir, dot: false })
    return files.sort()
  }

  private emitSync(event: SyncEvent): void {
    this.emit('sync', event)
  }

  // ============================================================
  // WATCHING
  // ============================================================

  /**
   * Start watching the memory directory. Changes to .md files schedule a
   * full sync after the debounce window. Emits 'ready' once the initial
   * scan is done.
   */
  startWatching(): void {
    if (this.watcher) return

    this.watcher = watch(this.memoryDir, {
      // Check the basename only, so a dot directory above the root is fine
      ignored: (path: string) => path !== this.memoryDir && basename(path).startsWith('.'),
      persistent: true,
      ignoreInitial: true,
      usePolling: this.usePolling,
      interval: POLL_INTERVAL_MS,
    })

    this.watcher.on('ready', () => {
      log.info({ dir: this.memoryDir, polling: this.usePolling }, 'Watcher ready')
      this.emit('ready')
    })
    this.watcher.on('add', (path: string) => this.handleChange('add', path))
    this.watcher.on('change', (path: string) => this.handleChange('change', path))
    this.watcher.on('unlink', (path: string) => this.handleChange('unlink', path))
    this.watcher.on('error', (error: unknown) => {
      log.error({ err: error }, 'Watcher error')
    })
  }

  /**
   * Stop watching, cancel a pending sync and wait for a running one.
   */
  async stopWatching(): Promise<void> {
    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer)
      this.debounceTimer = null
    }
    if (this.watcher) {
      const watcher = this.watcher
      this.watcher = null
      await watcher.close()
    }
    await this.mutex.idle()
  }

  get isWatching(): boolean {
    return this.watcher !== null
  }

  /**
   * Schedule a full sync. Requests inside an open window are absorbed by
   * it: at most one sync starts per window.
   */
  requestSync(): void {
    if (this.debounceTimer) return

    this.debounceTimer = setTimeout(() => {
      this.debounceTimer = null
      this.sync().catch((err: unknown) => {
        log.error({ err }, 'Background sync failed')
      })
    }, this.debounceMs)
  }

  private handleChange(event: 'add' | 'change' | 'unlink', path: string): void {
    if (!path.endsWith('.md')) return
    log.debug({ event, path }, 'Memory file changed')
    this.requestSync()
  }
}
