import type { LogLevel } from './logger.js'

export interface EmbeddingsConfig {
  /** Ollama server base URL */
  host: string
  /** Embedding model id; also the cache key namespace */
  model: string
}

export interface MemoryConfig {
  /** Markdown root (absolute after loading) */
  dir: string
  /** SQLite index file (absolute after loading) */
  dbPath: string
  chunkTokens: number
  chunkOverlap: number
  searchTopK: number
  vectorWeight: number
  textWeight: number
  watch: boolean
  watchDebounceMs: number
  /** Poll instead of native fs events (network drives, WSL2) */
  watchPolling: boolean
  embeddings: EmbeddingsConfig
}

export interface HearthConfig {
  agentDir: string
  memory: MemoryConfig
  log: { level: LogLevel }
}
