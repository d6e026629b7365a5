/**
 * Shared test helpers: temp directories, a deterministic embeddings
 * backend and a sqlite-vec probe.
 */

import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import Database from 'better-sqlite3'
import * as sqliteVec from 'sqlite-vec'
import { vi } from 'vitest'
import type { EmbeddingsPlugin } from '../src/memory/embeddings/types.js'

// -------------------------------------------------------------------
// Filesystem
// -------------------------------------------------------------------

export function createTempDir(prefix = 'hearth-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix))
}

export function cleanDir(dir: string): void {
  if (fs.existsSync(dir)) {
    fs.rmSync(dir, { recursive: true, force: true })
  }
}

export function writeFile(dir: string, relativePath: string, content: string): void {
  const fullPath = path.join(dir, relativePath)
  fs.mkdirSync(path.dirname(fullPath), { recursive: true })
  fs.writeFileSync(fullPath, content, 'utf-8')
}

// -------------------------------------------------------------------
// Embeddings
// -------------------------------------------------------------------

export const FAKE_DIMENSIONS = 16

/**
 * Hashed bag of words, L2-normalized. Texts sharing words point the same way.
 */
export function fakeEmbedding(text: string): number[] {
  const vector = new Array<number>(FAKE_DIMENSIONS).fill(0)
  for (const token of text.toLowerCase().match(/[a-z0-9]+/g) ?? []) {
    let bucket = 0
    for (const ch of token) {
      bucket = (bucket * 31 + ch.charCodeAt(0)) % FAKE_DIMENSIONS
    }
    vector[bucket] = (vector[bucket] ?? 0) + 1
  }
  const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0))
  return norm === 0 ? vector : vector.map((v) => v / norm)
}

export function createFakePlugin(modelName = 'fake-embed') {
  return {
    id: 'embeddings-fake',
    name: 'Fake Embeddings',
    modelName,
    getDimensions: () => FAKE_DIMENSIONS,
    isReady: vi.fn(async () => true),
    initialize: vi.fn(async () => {}),
    cleanup: vi.fn(async () => {}),
    embed: vi.fn(async (text: string) => fakeEmbedding(text)),
    embedBatch: vi.fn(async (texts: string[]) => texts.map(fakeEmbedding)),
  } satisfies EmbeddingsPlugin
}

export type FakePlugin = ReturnType<typeof createFakePlugin>

// -------------------------------------------------------------------
// Capabilities
// -------------------------------------------------------------------

/** True when the sqlite-vec extension loads on this platform */
export function sqliteVecAvailable(): boolean {
  const db = new Database(':memory:')
  try {
    sqliteVec.load(db)
    return true
  } catch {
    return false
  } finally {
    db.close()
  }
}
