/**
 * Memory Database
 * SQLite schema and operations for the memory index.
 * This database is derived: it can be deleted and rebuilt from the Markdown files.
 *
 * Keyword search (FTS5) and vector search (sqlite-vec) are optional: each is
 * probed once when the database opens. When one is missing, its searches
 * return nothing and its index writes are skipped; everything else works.
 *
 * @module memory/memory-db
 */

import Database from 'better-sqlite3'
import * as sqliteVec from 'sqlite-vec'
import { mkdirSync } from 'node:fs'
import { dirname } from 'node:path'
import { createLogger } from '../logger.js'
import { decodeVector, encodeVector } from './vector-codec.js'
import type { Chunk, FileRecord, MemoryStatus, NewChunk } from './types.js'

const log = createLogger('memory-db')

export interface MemoryDbOptions {
  /** Set false to run without sqlite-vec even when it is installed */
  vectorSearch?: boolean
  /** Set false to run without the FTS5 keyword index */
  keywordSearch?: boolean
}

export interface FtsRow {
  chunkId: number
  path: string
  startLine: number
  endLine: number
  text: string
  rank: number // FTS5 bm25 rank, more negative is better
}

export interface VectorRow {
  chunkId: number
  path: string
  startLine: number
  endLine: number
  text: string
  distance: number
}

interface FileRow {
  path: string
  hash: string
  mtime: number
  size: number
}

interface ChunkRow {
  id: number
  path: string
  start_line: number
  end_line: number
  hash: string
  model: string
  text: string
  embedding: Buffer | null
  updated_at: number
}

interface CountRow {
  count: number
}

export class MemoryDb {
  private db: Database.Database
  private ftsAvailable = false
  private vectorAvailable = false
  private dimensions: number | null = null

  constructor(dbPath: string, options: MemoryDbOptions = {}) {
    if (dbPath !== ':memory:') {
      mkdirSync(dirname(dbPath), { recursive: true })
    }
    this.db = new Database(dbPath)

    // WAL lets readers proceed while a sync is writing
    this.db.pragma('journal_mode = WAL')
    this.db.pragma('busy_timeout = 5000')

    this.initSchema()
    this.ftsAvailable = options.keywordSearch === false ? false : this.ensureFtsTable()
    this.vectorAvailable = options.vectorSearch === false ? false : this.loadVectorExtension()

    if (this.vectorAvailable) {
      const stored = this.getMeta('dimensions')
      if (stored !== null) this.ensureVectorTable(parseInt(stored, 10))
    }
  }

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS files (
        path TEXT PRIMARY KEY,
        hash TEXT NOT NULL,
        mtime REAL NOT NULL,
        size INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS chunks (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        path TEXT NOT NULL,
        start_line INTEGER NOT NULL,
        end_line INTEGER NOT NULL,
        hash TEXT NOT NULL,
        model TEXT NOT NULL,
        text TEXT NOT NULL,
        embedding BLOB,
        updated_at INTEGER NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_chunks_path ON chunks(path);

      CREATE TABLE IF NOT EXISTS embedding_cache (
        hash TEXT NOT NULL,
        model TEXT NOT NULL,
        embedding BLOB NOT NULL,
        updated_at INTEGER NOT NULL,
        PRIMARY KEY (hash, model)
      );
      CREATE INDEX IF NOT EXISTS idx_embedding_cache_updated_at ON embedding_cache(updated_at);

      CREATE TABLE IF NOT EXISTS meta (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL
      );
    `)
  }

  private ensureFtsTable(): boolean {
    try {
      this.db.exec(`
        CREATE VIRTUAL TABLE IF NOT EXISTS chunks_fts USING fts5(
          text,
          chunk_id UNINDEXED,
          path UNINDEXED,
          start_line UNINDEXED,
          end_line UNINDEXED
        )
      `)
      return true
    } catch (err) {
      log.warn({ err }, 'FTS5 unavailable, keyword search disabled')
      return false
    }
  }

  private loadVectorExtension(): boolean {
    try {
      sqliteVec.load(this.db)
      return true
    } catch (err) {
      log.warn({ err }, 'sqlite-vec unavailable, vector search disabled')
      return false
    }
  }

  /**
   * Create the vector table for the given dimensions, or recreate it when
   * the dimensions changed. The table cannot exist before the first
   * embedding tells us its width.
   */
  ensureVectorTable(dimensions: number): boolean {
    if (!this.vectorAvailable) return false
    if (this.dimensions === dimensions) return true

    if (this.dimensions !== null) {
      log.info({ from: this.dimensions, to: dimensions }, 'Embedding dimensions changed, recreating vector table')
      this.db.exec('DROP TABLE IF EXISTS chunks_vec')
    }

    try {
      this.db.exec(`CREATE VIRTUAL TABLE IF NOT EXISTS chunks_vec USING vec0(embedding float[${dimensions}])`)
    } catch (err) {
      log.warn({ err, dimensions }, 'Could not create vector table')
      return false
    }

    this.dimensions = dimensions
    this.setMeta('dimensions', String(dimensions))
    return true
  }

  isKeywordSearchAvailable(): boolean {
    return this.ftsAvailable
  }

  isVectorSearchAvailable(): boolean {
    return this.vectorAvailable
  }

  getDimensions(): number | null {
    return this.dimensions
  }

  /**
   * Run `fn` in one transaction. Rolls back and rethrows if it throws.
   */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)()
  }

  // ============================================================
  // META OPERATIONS
  // ============================================================

  getMeta(key: string): string | null {
    const row = this.db.prepare<[string], { value: string }>('SELECT value FROM meta WHERE key = ?').get(key)
    return row?.value ?? null
  }

  setMeta(key: string, value: string): void {
    this.db.prepare('INSERT OR REPLACE INTO meta (key, value) VALUES (?, ?)').run(key, value)
  }

  deleteMeta(key: string): void {
    this.db.prepare('DELETE FROM meta WHERE key = ?').run(key)
  }

  // ============================================================
  // FILE OPERATIONS
  // ============================================================

  getFile(path: string): FileRecord | null {
    const row = this.db
      .prepare<[string], FileRow>('SELECT path, hash, mtime, size FROM files WHERE path = ?')
      .get(path)
    return row ?? null
  }

  listFiles(): FileRecord[] {
    return this.db.prepare<[], FileRow>('SELECT path, hash, mtime, size FROM files ORDER BY path').all()
  }

  upsertFile(file: FileRecord): void {
    this.db
      .prepare('INSERT OR REPLACE INTO files (path, hash, mtime, size) VALUES (?, ?, ?, ?)')
      .run(file.path, file.hash, file.mtime, file.size)
  }

  deleteFile(path: string): void {
    this.db.prepare('DELETE FROM files WHERE path = ?').run(path)
  }

  // ============================================================
  // CHUNK OPERATIONS
  // ============================================================

  /**
   * Insert a chunk row plus its keyword and vector index rows.
   * Index rows are best-effort; the chunk row is not.
   */
  insertChunk(chunk: NewChunk): number {
    const info = this.db
      .prepare(
        `INSERT INTO chunks (path, start_line, end_line, hash, model, text, embedding, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        chunk.path,
        chunk.startLine,
        chunk.endLine,
        chunk.hash,
        chunk.model,
        chunk.text,
        chunk.embedding ? encodeVector(chunk.embedding) : null,
        chunk.updatedAt,
      )
    const chunkId = Number(info.lastInsertRowid)

    if (this.ftsAvailable) {
      try {
        this.db
          .prepare(
            `INSERT INTO chunks_fts (text, chunk_id, path, start_line, end_line)
             VALUES (?, ?, ?, ?, ?)`,
          )
          .run(chunk.text, chunkId, chunk.path, chunk.startLine, chunk.endLine)
      } catch (err) {
        log.debug({ err, chunkId }, 'Keyword index insert failed')
      }
    }

    if (chunk.embedding && this.ensureVectorTable(chunk.embedding.length)) {
      try {
        // vec0 only accepts integer rowids; plain JS numbers bind as REAL
        this.db
          .prepare('INSERT INTO chunks_vec (rowid, embedding) VALUES (?, ?)')
          .run(BigInt(chunkId), encodeVector(chunk.embedding))
      } catch (err) {
        log.debug({ err, chunkId }, 'Vector index insert failed')
      }
    }

    return chunkId
  }

  /**
   * Remove every chunk of a file along with its index rows.
   * Returns the removed chunk ids.
   */
  deleteChunksForFile(path: string): number[] {
    const ids = this.db
      .prepare<[string], { id: number }>('SELECT id FROM chunks WHERE path = ?')
      .all(path)
      .map((row) => row.id)

    if (ids.length === 0) return ids

    const placeholders = ids.map(() => '?').join(',')

    if (this.ftsAvailable) {
      try {
        this.db.prepare(`DELETE FROM chunks_fts WHERE chunk_id IN (${placeholders})`).run(...ids)
      } catch (err) {
        log.debug({ err, path }, 'Keyword index delete failed')
      }
    }

    if (this.dimensions !== null) {
      try {
        const deleteVec = this.db.prepare('DELETE FROM chunks_vec WHERE rowid = ?')
        for (const id of ids) {
          deleteVec.run(BigInt(id))
        }
      } catch (err) {
        log.debug({ err, path }, 'Vector index delete failed')
      }
    }

    this.db.prepare(`DELETE FROM chunks WHERE id IN (${placeholders})`).run(...ids)
    return ids
  }

  getChunk(id: number): Chunk | null {
    const row = this.db.prepare<[number], ChunkRow>('SELECT * FROM chunks WHERE id = ?').get(id)
    return row ? toChunk(row) : null
  }

  listChunks(path: string): Chunk[] {
    return this.db
      .prepare<[string], ChunkRow>('SELECT * FROM chunks WHERE path = ? ORDER BY start_line, id')
      .all(path)
      .map(toChunk)
  }

  countChunks(path?: string): number {
    const row =
      path === undefined
        ? this.db.prepare<[], CountRow>('SELECT COUNT(*) AS count FROM chunks').get()
        : this.db.prepare<[string], CountRow>('SELECT COUNT(*) AS count FROM chunks WHERE path = ?').get(path)
    return row?.count ?? 0
  }

  countKeywordRows(path?: string): number {
    if (!this.ftsAvailable) return 0
    const row =
      path === undefined
        ? this.db.prepare<[], CountRow>('SELECT COUNT(*) AS count FROM chunks_fts').get()
        : this.db.prepare<[string], CountRow>('SELECT COUNT(*) AS count FROM chunks_fts WHERE path = ?').get(path)
    return row?.count ?? 0
  }

  countVectorRows(): number {
    if (this.dimensions === null) return 0
    const row = this.db.prepare<[], CountRow>('SELECT COUNT(*) AS count FROM chunks_vec').get()
    return row?.count ?? 0
  }

  // ============================================================
  // EMBEDDING CACHE
  // ============================================================

  getCachedEmbedding(hash: string, model: string): Buffer | null {
    const row = this.db
      .prepare<[string, string], { embedding: Buffer }>(
        'SELECT embedding FROM embedding_cache WHERE hash = ? AND model = ?',
      )
      .get(hash, model)
    return row?.embedding ?? null
  }

  cacheEmbedding(hash: string, model: string, embedding: Buffer): void {
    this.db
      .prepare(
        `INSERT OR REPLACE INTO embedding_cache (hash, model, embedding, updated_at)
         VALUES (?, ?, ?, ?)`,
      )
      .run(hash, model, embedding, Date.now())
  }

  countCachedEmbeddings(): number {
    return this.db.prepare<[], CountRow>('SELECT COUNT(*) AS count FROM embedding_cache').get()?.count ?? 0
  }

  // ============================================================
  // SEARCH OPERATIONS
  // ============================================================

  /**
   * FTS5 BM25 keyword search. `query` must already be FTS5 syntax.
   */
  searchFts(query: string, limit: number): FtsRow[] {
    if (!this.ftsAvailable) return []

    try {
      const rows = this.db
        .prepare<
          [string, number],
          { chunk_id: number; path: string; start_line: number; end_line: number; text: string; rank: number }
        >(
          `SELECT chunk_id, path, start_line, end_line, text, rank
           FROM chunks_fts
           WHERE chunks_fts MATCH ?
           ORDER BY rank
           LIMIT ?`,
        )
        .all(query, limit)
      return rows.map((r) => ({
        chunkId: Number(r.chunk_id),
        path: r.path,
        startLine: Number(r.start_line),
        endLine: Number(r.end_line),
        text: r.text,
        rank: r.rank,
      }))
    } catch (err) {
      log.warn({ err, query }, 'Keyword search failed')
      return []
    }
  }

  /**
   * Nearest-neighbour search over chunk embeddings (L2 distance).
   */
  searchVector(embedding: readonly number[], limit: number): VectorRow[] {
    if (!this.vectorAvailable || this.dimensions === null) return []
    if (embedding.length !== this.dimensions) {
      log.warn(
        { expected: this.dimensions, received: embedding.length },
        'Query embedding has the wrong dimensions, skipping vector search',
      )
      return []
    }

    try {
      const rows = this.db
        .prepare<
          [Buffer, bigint],
          { chunk_id: number; path: string; start_line: number; end_line: number; text: string; distance: number }
        >(
          `WITH knn AS (
             SELECT rowid, distance
             FROM chunks_vec
             WHERE embedding MATCH ? AND k = ?
           )
           SELECT c.id AS chunk_id, c.path, c.start_line, c.end_line, c.text, knn.distance
           FROM knn
           JOIN chunks c ON c.id = knn.rowid
           ORDER BY knn.distance`,
        )
        .all(encodeVector(embedding), BigInt(limit))
      return rows.map((r) => ({
        chunkId: r.chunk_id,
        path: r.path,
        startLine: r.start_line,
        endLine: r.end_line,
        text: r.text,
        distance: r.distance,
      }))
    } catch (err) {
      log.warn({ err }, 'Vector search failed')
      return []
    }
  }

  // ============================================================
  // STATUS
  // ============================================================

  getStatus(): MemoryStatus {
    const filesIndexed =
      this.db.prepare<[], CountRow>('SELECT COUNT(*) AS count FROM files').get()?.count ?? 0

    return {
      filesIndexed,
      totalChunks: this.countChunks(),
      cachedEmbeddings: this.countCachedEmbeddings(),
      keywordSearch: this.ftsAvailable,
      vectorSearch: this.vectorAvailable,
      embeddingModel: this.getMeta('embeddingModel'),
      dimensions: this.dimensions,
      lastSync: this.getMeta('lastSync'),
    }
  }

  // ============================================================
  // MAINTENANCE
  // ============================================================

  /**
   * Drop all indexed files and chunks. The embedding cache survives, so a
   * rebuild with the same model does not recompute vectors.
   */
  clearIndex(): void {
    this.transaction(() => {
      if (this.ftsAvailable) {
        this.db.prepare('DELETE FROM chunks_fts').run()
      }
      if (this.dimensions !== null) {
        this.db.prepare('DELETE FROM chunks_vec').run()
      }
      this.db.prepare('DELETE FROM chunks').run()
      this.db.prepare('DELETE FROM files').run()
    })
  }

  close(): void {
    this.db.close()
  }
}

function toChunk(row: ChunkRow): Chunk {
  return {
    id: row.id,
    path: row.path,
    startLine: row.start_line,
    endLine: row.end_line,
    hash: row.hash,
    model: row.model,
    text: row.text,
    embedding: row.embedding ? decodeVector(row.embedding) : null,
    updatedAt: row.updated_at,
  }
}
