/**
 * Ollama Embeddings Plugin
 * Embeddings via an Ollama server. Works with any Ollama embedding model.
 *
 * @module memory/embeddings/ollama
 */

import { z } from 'zod'

import { createLogger } from '../../logger.js'
import type { EmbeddingsPlugin, HealthResult } from './types.js'

const log = createLogger('embeddings-ollama')

const DEFAULT_HOST = 'http://localhost:11434'
const DEFAULT_MODEL = 'nomic-embed-text'
const HEALTH_TIMEOUT_MS = 5000
const EMBED_TIMEOUT_MS = 30000
const EMBED_BATCH_TIMEOUT_MS = 60000

export interface OllamaPluginConfig {
  host?: string
  model?: string
}

const tagsResponseSchema = z.object({
  models: z.array(z.object({ name: z.string() })).optional(),
})

// Element values are checked by isValidEmbedding
const embedResponseSchema = z.object({
  embeddings: z.array(z.array(z.unknown())).optional(),
})

type TagsResponse = z.infer<typeof tagsResponseSchema>

export class OllamaEmbeddingsPlugin implements EmbeddingsPlugin {
  readonly id = 'embeddings-ollama'
  readonly name = 'Ollama Embeddings'

  private host: string
  private model: string
  private dimensions: number | null = null
  private ready = false

  constructor(config?: OllamaPluginConfig) {
    this.host = (config?.host ?? DEFAULT_HOST).replace(/\/+$/, '')
    this.model = config?.model ?? DEFAULT_MODEL
  }

  get modelName(): string {
    return this.model
  }

  getDimensions(): number | null {
    return this.dimensions
  }

  async isReady(): Promise<boolean> {
    return this.ready
  }

  async initialize(): Promise<void> {
    if (this.ready) return

    const health = await this.healthCheck()
    if (!health.healthy) {
      throw new Error(
        `${health.message ?? 'Ollama health check failed'}${health.resolution ? ` (${health.resolution})` : ''}`,
      )
    }

    // Detect dimensions with a test embedding
    let testEmbedding: number[]
    try {
      testEmbedding = await this.embedInternal('test')
    } catch (err) {
      throw new Error(
        `Model '${this.model}' does not support embeddings. ` +
          `Use an embeddings model like 'nomic-embed-text' or 'mxbai-embed-large'.`,
        { cause: err },
      )
    }

    this.dimensions = testEmbedding.length
    this.ready = true
    log.info({ model: this.model, dimensions: this.dimensions }, 'Ollama embeddings ready')
  }

  async cleanup(): Promise<void> {
    this.ready = false
    this.dimensions = null
  }

  async embed(text: string): Promise<number[]> {
    if (!this.ready) {
      throw new Error('Plugin not initialized. Call initialize() first.')
    }
    return this.embedInternal(text)
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    if (!this.ready) {
      throw new Error('Plugin not initialized. Call initialize() first.')
    }
    if (texts.length === 0) return []
    return this.requestEmbeddings(texts, EMBED_BATCH_TIMEOUT_MS)
  }

  async healthCheck(): Promise<HealthResult> {
    let tagsResponse: Response
    try {
      tagsResponse = await fetch(`${this.host}/api/tags`, {
        method: 'GET',
        signal: AbortSignal.timeout(HEALTH_TIMEOUT_MS),
      })
    } catch {
      return {
        healthy: false,
        message: `Cannot reach Ollama server at ${this.host}`,
        resolution: 'Check that Ollama is running and the host is correct.',
      }
    }

    if (!tagsResponse.ok) {
      return {
        healthy: false,
        message: `Ollama server returned HTTP ${tagsResponse.status}`,
        resolution: 'Check that the Ollama server is running correctly.',
      }
    }

    let data: TagsResponse
    try {
      data = tagsResponseSchema.parse(await tagsResponse.json())
    } catch {
      return {
        healthy: false,
        message: 'Failed to parse Ollama server response',
        resolution: 'Check that the Ollama server is running correctly.',
      }
    }

    const modelFound = (data.models ?? []).some(
      (m) => m.name === this.model || m.name.startsWith(this.model + ':'),
    )
    if (!modelFound) {
      return {
        healthy: false,
        message: `Model '${this.model}' is not installed on the Ollama server`,
        resolution: `Run 'ollama pull ${this.model}' on the Ollama server.`,
      }
    }

    return { healthy: true }
  }

  // ============================================================
  // PRIVATE METHODS
  // ============================================================

  private async embedInternal(text: string): Promise<number[]> {
    const [embedding] = await this.requestEmbeddings([text], EMBED_TIMEOUT_MS)
    if (!embedding) {
      throw new Error('Ollama returned no embeddings')
    }
    return embedding
  }

  /**
   * POST /api/embed, retrying once. Vectors come back L2-normalized.
   */
  private async requestEmbeddings(texts: string[], timeoutMs: number): Promise<number[][]> {
    let lastError: Error | null = null

    for (let attempt = 0; attempt < 2; attempt++) {
      try {
        const response = await fetch(`${this.host}/api/embed`, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify({
            model: this.model,
            input: texts.length === 1 ? texts[0] : texts,
          }),
          signal: AbortSignal.timeout(timeoutMs),
        })

        if (!response.ok) {
          const error = await response.text()
          throw new Error(`Ollama embed failed: ${error}`)
        }

        const data = embedResponseSchema.parse(await response.json())
        const embeddings = data.embeddings ?? []
        if (embeddings.length !== texts.length) {
          throw new Error(`Ollama returned ${embeddings.length} embeddings for ${texts.length} inputs`)
        }
        if (!embeddings.every(isValidEmbedding)) {
          throw new Error(`Model '${this.model}' returned invalid embeddings`)
        }

        return embeddings.map(normalize)
      } catch (err) {
        lastError = err instanceof Error ? err : new Error(String(err))
        if (attempt === 0) {
          log.debug({ err: lastError.message }, 'Ollama embed failed, retrying once')
        }
      }
    }

    throw lastError ?? new Error('Embed failed after retry')
  }
}

function isValidEmbedding(embedding: unknown[]): embedding is number[] {
  return embedding.length > 0 && embedding.every((v) => typeof v === 'number' && Number.isFinite(v))
}

function normalize(embedding: number[]): number[] {
  const norm = Math.sqrt(embedding.reduce((sum, v) => sum + v * v, 0))
  return norm === 0 ? embedding : embedding.map((v) => v / norm)
}

/**
 * Create an Ollama embeddings plugin instance.
 */
export function createOllamaPlugin(config?: OllamaPluginConfig): OllamaEmbeddingsPlugin {
  return new OllamaEmbeddingsPlugin(config)
}
