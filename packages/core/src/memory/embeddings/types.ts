/**
 * Embeddings Plugin Interface
 * Defines the contract for embedding backends.
 *
 * @module memory/embeddings/types
 */

export interface HealthResult {
  healthy: boolean
  message?: string
  resolution?: string // What the user can do about it
}

export interface EmbeddingsPlugin {
  // Identity
  readonly id: string // "embeddings-ollama"
  readonly name: string // "Ollama Embeddings"

  // Model info; also the embedding cache namespace
  readonly modelName: string // "nomic-embed-text"

  // Dimensions (available after initialization)
  getDimensions(): number | null

  // Lifecycle
  isReady(): Promise<boolean> // Can embed right now?
  initialize(): Promise<void> // Connect/load the model
  cleanup(): Promise<void> // Release resources

  // Core operations; embedBatch output order matches input order
  embed(text: string): Promise<number[]>
  embedBatch(texts: string[]): Promise<number[][]>
}
