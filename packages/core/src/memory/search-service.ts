/**
 * Hybrid Search Service
 * Combines sqlite-vec nearest-neighbour search and FTS5 BM25 ranking with a
 * weighted score merge.
 *
 * @module memory/search-service
 */

import type { MemoryDb } from './memory-db.js'
import type { HybridSearchOptions, SearchResult } from './types.js'

export const SNIPPET_MAX_CHARS = 700
const DEFAULT_TOP_K = 5
const DEFAULT_VECTOR_WEIGHT = 0.7
const DEFAULT_TEXT_WEIGHT = 0.3

export interface SearchServiceOptions {
  db: MemoryDb
}

export class SearchService {
  private db: MemoryDb

  constructor(options: SearchServiceOptions) {
    this.db = options.db
  }

  /**
   * Nearest chunks to `embedding`. Empty when vector search is unavailable.
   */
  searchVector(embedding: readonly number[], topK: number = DEFAULT_TOP_K): SearchResult[] {
    return this.db.searchVector(embedding, topK).map((row) => ({
      chunkId: row.chunkId,
      path: row.path,
      startLine: row.startLine,
      endLine: row.endLine,
      snippet: toSnippet(row.text),
      score: distanceToScore(row.distance),
    }))
  }

  /**
   * Chunks containing every token of `query`, best BM25 rank first.
   */
  searchKeyword(query: string, topK: number = DEFAULT_TOP_K): SearchResult[] {
    const ftsQuery = buildFtsQuery(query)
    if (!ftsQuery) return []

    return this.db.searchFts(ftsQuery, topK).map((row) => ({
      chunkId: row.chunkId,
      path: row.path,
      startLine: row.startLine,
      endLine: row.endLine,
      snippet: toSnippet(row.text),
      score: bm25RankToScore(row.rank),
    }))
  }

  /**
   * Run both searches with 2 × topK candidates each and merge them.
   */
  searchHybrid(
    query: string,
    embedding: readonly number[],
    options: Partial<HybridSearchOptions> = {},
  ): SearchResult[] {
    const merged: HybridSearchOptions = {
      topK: options.topK ?? DEFAULT_TOP_K,
      vectorWeight: options.vectorWeight ?? DEFAULT_VECTOR_WEIGHT,
      textWeight: options.textWeight ?? DEFAULT_TEXT_WEIGHT,
    }
    const candidates = merged.topK * 2

    return mergeHybridResults(
      this.searchVector(embedding, candidates),
      this.searchKeyword(query, candidates),
      merged,
    )
  }
}

interface MergeEntry {
  result: SearchResult
  vectorScore: number
  textScore: number
}

/**
 * Merge vector and keyword hits by chunk id.
 *
 * score = vectorWeight × vectorScore + textWeight × textScore, where a side
 * that did not return the chunk contributes 0. The keyword snippet replaces
 * the vector one when both exist. Ties keep first-seen order.
 */
export function mergeHybridResults(
  vectorResults: SearchResult[],
  keywordResults: SearchResult[],
  options: HybridSearchOptions,
): SearchResult[] {
  const byId = new Map<number, MergeEntry>()

  for (const r of vectorResults) {
    byId.set(r.chunkId, { result: { ...r }, vectorScore: r.score, textScore: 0 })
  }

  for (const r of keywordResults) {
    const existing = byId.get(r.chunkId)
    if (existing) {
      existing.textScore = r.score
      if (r.snippet) existing.result.snippet = r.snippet
    } else {
      byId.set(r.chunkId, { result: { ...r }, vectorScore: 0, textScore: r.score })
    }
  }

  return [...byId.values()]
    .map((entry) => ({
      ...entry.result,
      score: options.vectorWeight * entry.vectorScore + options.textWeight * entry.textScore,
    }))
    .sort((a, b) => b.score - a.score)
    .slice(0, options.topK)
}

/**
 * Turn free text into an FTS5 query: every letter/number run becomes a
 * quoted term and all terms are required. Returns null when there are none.
 */
export function buildFtsQuery(raw: string): string | null {
  const tokens = raw.match(/[\p{L}\p{N}_]+/gu)
  if (!tokens || tokens.length === 0) return null
  return tokens.map((t) => `"${t}"`).join(' AND ')
}

/**
 * FTS5 rank (negative, lower is better) → (0, 1), increasing with relevance.
 */
export function bm25RankToScore(rank: number): number {
  const normalized = rank < 0 ? -rank : 0
  return 1 / (1 + 1 / (normalized + 0.001))
}

/**
 * Vector distance → (0, 1], 1 at distance 0.
 */
export function distanceToScore(distance: number): number {
  return 1 / (1 + distance)
}

function toSnippet(text: string): string {
  return text.slice(0, SNIPPET_MAX_CHARS)
}
