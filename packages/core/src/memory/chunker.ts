/**
 * Markdown Chunking
 * Splits markdown files into overlapping, line-addressed chunks for embedding.
 *
 * @module memory/chunker
 */

import { createHash } from 'node:crypto'

export interface ChunkResult {
  text: string
  startLine: number // 1-indexed, inclusive
  endLine: number // 1-indexed, inclusive
  hash: string // SHA256 of chunk text
}

export interface ChunkerOptions {
  chunkTokens?: number // Default: 2000
  overlapTokens?: number // Default: 200
}

// No tokenizer: one token is approximated as four characters
export const CHARS_PER_TOKEN = 4
const MIN_CHUNK_CHARS = 32
const DEFAULT_CHUNK_TOKENS = 2000
const DEFAULT_OVERLAP_TOKENS = 200

interface NumberedLine {
  lineNo: number
  text: string
}

/**
 * Chunk markdown text into overlapping segments.
 *
 * Lines accumulate until the next one would overflow the character budget,
 * then the chunk is flushed and a tail of its lines (up to the overlap
 * budget) seeds the next one. Every input line lands in at least one chunk.
 */
export function chunkMarkdown(content: string, options: ChunkerOptions = {}): ChunkResult[] {
  if (content.trim() === '') return []

  const chunkTokens = options.chunkTokens ?? DEFAULT_CHUNK_TOKENS
  const overlapTokens = options.overlapTokens ?? DEFAULT_OVERLAP_TOKENS
  const maxChars = Math.max(MIN_CHUNK_CHARS, chunkTokens * CHARS_PER_TOKEN)
  const overlapChars = Math.max(0, overlapTokens * CHARS_PER_TOKEN)

  const lines = content.split('\n')
  const chunks: ChunkResult[] = []
  let current: NumberedLine[] = []
  let currentChars = 0

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i] ?? ''
    const lineChars = line.length + 1 // +1 for the newline

    if (currentChars + lineChars > maxChars && current.length > 0) {
      chunks.push(toChunk(current))
      current = overlapTail(current, overlapChars)
      currentChars = current.reduce((sum, entry) => sum + entry.text.length + 1, 0)
    }

    current.push({ lineNo: i + 1, text: line })
    currentChars += lineChars
  }

  if (current.length > 0) {
    chunks.push(toChunk(current))
  }

  return chunks
}

function toChunk(lines: NumberedLine[]): ChunkResult {
  const first = lines[0]
  const last = lines[lines.length - 1]
  if (!first || !last) {
    throw new Error('Cannot build a chunk from zero lines')
  }
  const text = lines.map((entry) => entry.text).join('\n')
  return {
    text,
    startLine: first.lineNo,
    endLine: last.lineNo,
    hash: hashText(text),
  }
}

/**
 * Lines from the end of a flushed chunk that fit the overlap budget.
 * The last line is always kept when the budget is positive, so the
 * walk makes progress even when that line alone exceeds it.
 */
function overlapTail(lines: NumberedLine[], overlapChars: number): NumberedLine[] {
  if (overlapChars <= 0) return []

  const kept: NumberedLine[] = []
  let chars = 0
  for (let i = lines.length - 1; i >= 0; i--) {
    const entry = lines[i]
    if (!entry) continue
    const lineChars = entry.text.length + 1
    if (chars + lineChars > overlapChars && kept.length > 0) break
    kept.unshift(entry)
    chars += lineChars
  }
  return kept
}

/**
 * SHA256 hash of text, hex-encoded.
 */
export function hashText(text: string): string {
  return createHash('sha256').update(text).digest('hex')
}

/**
 * Hash file content for change detection. A string hashes the same as its
 * UTF-8 bytes.
 */
export function hashFileContent(content: string | Uint8Array): string {
  return createHash('sha256').update(content).digest('hex')
}
