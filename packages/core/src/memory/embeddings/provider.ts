/**
 * Embedding Provider
 * Cache-first front for an embeddings plugin. Vectors are cached in the
 * memory database keyed by (sha256(text), model), so identical text is
 * embedded once per model no matter which file or query it came from.
 *
 * @module memory/embeddings/provider
 */

import { createLogger } from '../../logger.js'
import { hashText } from '../chunker.js'
import type { MemoryDb } from '../memory-db.js'
import { decodeVector, encodeVector } from '../vector-codec.js'
import type { EmbeddingsPlugin } from './types.js'

const log = createLogger('embedding-provider')

export interface EmbeddingProviderOptions {
  db: MemoryDb
  plugin: EmbeddingsPlugin
}

export class EmbeddingProvider {
  private db: MemoryDb
  private plugin: EmbeddingsPlugin
  private initializing: Promise<void> | null = null

  constructor(options: EmbeddingProviderOptions) {
    this.db = options.db
    this.plugin = options.plugin
  }

  get modelId(): string {
    return this.plugin.modelName
  }

  async embed(text: string): Promise<number[]> {
    const hash = hashText(text)
    const cached = this.readCache(hash)
    if (cached) return cached

    await this.ensureInitialized()
    let vector: number[]
    try {
      vector = await this.plugin.embed(text)
    } catch (err) {
      throw new Error(`Embedding failed (${this.modelId}): ${errorMessage(err)}`, { cause: err })
    }

    this.db.cacheEmbedding(hash, this.modelId, encodeVector(vector))
    return vector
  }

  /**
   * Embed many texts, calling the backend once for the distinct cache misses.
   * Output order and length match `texts`.
   */
  async embedBatch(texts: string[]): Promise<number[][]> {
    const hashes = texts.map(hashText)
    const resolved = new Map<string, number[]>()
    const missing: Array<{ hash: string; text: string }> = []
    const seen = new Set<string>()

    hashes.forEach((hash, i) => {
      if (seen.has(hash)) return
      seen.add(hash)
      const cached = this.readCache(hash)
      if (cached) {
        resolved.set(hash, cached)
      } else {
        missing.push({ hash, text: texts[i] ?? '' })
      }
    })

    if (missing.length > 0) {
      await this.ensureInitialized()
      let vectors: number[][]
      try {
        vectors = await this.plugin.embedBatch(missing.map((m) => m.text))
      } catch (err) {
        throw new Error(`Embedding failed (${this.modelId}): ${errorMessage(err)}`, { cause: err })
      }
      if (vectors.length !== missing.length) {
        throw new Error(
          `Embedding backend returned ${vectors.length} vectors for ${missing.length} inputs (${this.modelId})`,
        )
      }

      this.db.transaction(() => {
        missing.forEach((m, i) => {
          const vector = vectors[i] ?? []
          resolved.set(m.hash, vector)
          this.db.cacheEmbedding(m.hash, this.modelId, encodeVector(vector))
        })
      })
    }

    return hashes.map((hash) => {
      const vector = resolved.get(hash)
      if (!vector) throw new Error(`Missing embedding for text hash ${hash}`)
      return vector
    })
  }

  private readCache(hash: string): number[] | null {
    const blob = this.db.getCachedEmbedding(hash, this.modelId)
    if (!blob) return null

    const vector = decodeVector(blob)
    if (!vector) {
      // Treated as a miss; the recomputed vector overwrites it
      log.warn({ hash, model: this.modelId, bytes: blob.byteLength }, 'Malformed cached embedding')
    }
    return vector
  }

  /**
   * Initialize the plugin on first use. A failed attempt is not remembered,
   * so the next call tries again.
   */
  private ensureInitialized(): Promise<void> {
    if (!this.initializing) {
      this.initializing = this.plugin.initialize().catch((err: unknown) => {
        this.initializing = null
        throw new Error(`Embedding model failed to load (${this.modelId}): ${errorMessage(err)}`, {
          cause: err,
        })
      })
    }
    return this.initializing
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
