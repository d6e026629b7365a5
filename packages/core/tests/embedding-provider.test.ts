/**
 * EmbeddingProvider: cache-first embedding over a fake backend.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'

import { hashText } from '../src/memory/chunker.js'
import { EmbeddingProvider } from '../src/memory/embeddings/provider.js'
import { MemoryDb } from '../src/memory/memory-db.js'
import { decodeVector } from '../src/memory/vector-codec.js'
import { createFakePlugin, fakeEmbedding, type FakePlugin } from './helpers.js'

describe('EmbeddingProvider', () => {
  let db: MemoryDb
  let plugin: FakePlugin
  let provider: EmbeddingProvider

  beforeEach(() => {
    db = new MemoryDb(':memory:', { vectorSearch: false })
    plugin = createFakePlugin()
    provider = new EmbeddingProvider({ db, plugin })
  })

  afterEach(() => {
    db.close()
  })

  it('uses the plugin model as its id', () => {
    expect(provider.modelId).toBe('fake-embed')
  })

  // -------------------------------------------------------------------
  // Single text
  // -------------------------------------------------------------------

  it('embeds once per text and serves repeats from the cache', async () => {
    const first = await provider.embed('the quick brown fox')
    const second = await provider.embed('the quick brown fox')

    expect(plugin.embed).toHaveBeenCalledTimes(1)
    expect(plugin.initialize).toHaveBeenCalledTimes(1)
    expect(second).toHaveLength(first.length)
    second.forEach((v, i) => expect(v).toBeCloseTo(first[i] ?? Number.NaN, 6))
    expect(db.countCachedEmbeddings()).toBe(1)
  })

  it('does not initialize the backend for a cache hit', async () => {
    await provider.embed('warm')

    const other = createFakePlugin()
    const cold = new EmbeddingProvider({ db, plugin: other })
    await cold.embed('warm')

    expect(other.initialize).not.toHaveBeenCalled()
    expect(other.embed).not.toHaveBeenCalled()
  })

  it('keeps separate cache entries per model', async () => {
    await provider.embed('shared text')
    const otherPlugin = createFakePlugin('other-model')
    const other = new EmbeddingProvider({ db, plugin: otherPlugin })

    await other.embed('shared text')

    expect(otherPlugin.embed).toHaveBeenCalledTimes(1)
    expect(db.countCachedEmbeddings()).toBe(2)
  })

  it('treats a malformed cached vector as a miss and overwrites it', async () => {
    db.cacheEmbedding(hashText('corrupt'), 'fake-embed', Buffer.from([1, 2, 3]))

    const vector = await provider.embed('corrupt')

    expect(plugin.embed).toHaveBeenCalledTimes(1)
    expect(vector).toEqual(fakeEmbedding('corrupt'))
    const blob = db.getCachedEmbedding(hashText('corrupt'), 'fake-embed')
    expect(blob ? decodeVector(blob) : null).not.toBeNull()
  })

  it('rejects and caches nothing when the backend fails', async () => {
    plugin.embed.mockRejectedValueOnce(new Error('boom'))

    await expect(provider.embed('text')).rejects.toThrow('Embedding failed (fake-embed): boom')
    expect(db.countCachedEmbeddings()).toBe(0)
  })

  it('retries initialization after a failed attempt', async () => {
    plugin.initialize.mockRejectedValueOnce(new Error('model missing'))

    await expect(provider.embed('text')).rejects.toThrow('Embedding model failed to load (fake-embed): model missing')
    await provider.embed('text')

    expect(plugin.initialize).toHaveBeenCalledTimes(2)
    expect(plugin.embed).toHaveBeenCalledTimes(1)
  })

  // -------------------------------------------------------------------
  // Batches
  // -------------------------------------------------------------------

  it('sends only cache misses to the backend', async () => {
    await provider.embed('alpha')

    const vectors = await provider.embedBatch(['alpha', 'beta'])

    expect(plugin.embedBatch).toHaveBeenCalledTimes(1)
    expect(plugin.embedBatch).toHaveBeenCalledWith(['beta'])
    expect(vectors).toHaveLength(2)
    expect(vectors[1]).toEqual(fakeEmbedding('beta'))
  })

  it('embeds duplicate texts once and preserves input order', async () => {
    const vectors = await provider.embedBatch(['x', 'y', 'x'])

    expect(plugin.embedBatch).toHaveBeenCalledWith(['x', 'y'])
    expect(vectors).toEqual([fakeEmbedding('x'), fakeEmbedding('y'), fakeEmbedding('x')])
    expect(db.countCachedEmbeddings()).toBe(2)
  })

  it('skips the backend when every text is cached', async () => {
    await provider.embedBatch(['one', 'two'])
    await provider.embedBatch(['two', 'one'])

    expect(plugin.embedBatch).toHaveBeenCalledTimes(1)
  })

  it('returns nothing for an empty batch', async () => {
    expect(await provider.embedBatch([])).toEqual([])
    expect(plugin.embedBatch).not.toHaveBeenCalled()
    expect(plugin.initialize).not.toHaveBeenCalled()
  })

  it('rejects when the backend returns the wrong number of vectors', async () => {
    plugin.embedBatch.mockResolvedValueOnce([])

    await expect(provider.embedBatch(['a', 'b'])).rejects.toThrow(
      'Embedding backend returned 0 vectors for 2 inputs (fake-embed)',
    )
    expect(db.countCachedEmbeddings()).toBe(0)
  })
})
