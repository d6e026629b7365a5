/**
 * Session Daily Log
 * Appends query/response records to daily/<YYYY-MM-DD>.md under the memory
 * root, where the next sync picks them up like any other note.
 *
 * @module memory/daily-log
 */

import { appendFile, mkdir } from 'node:fs/promises'
import { join } from 'node:path'

export interface SessionEntry {
  /** ISO-8601 timestamp; the file date comes from its first 10 characters */
  timestamp: string
  query: string
  response: string
  decisions?: string[]
}

/**
 * Append one entry and return the path of the file written.
 */
export async function logSession(dailyDir: string, entry: SessionEntry): Promise<string> {
  await mkdir(dailyDir, { recursive: true })

  const filePath = join(dailyDir, `${entryDate(entry.timestamp)}.md`)
  await appendFile(filePath, formatSessionEntry(entry), 'utf-8')
  return filePath
}

export function formatSessionEntry(entry: SessionEntry): string {
  const lines = [`\n## ${entry.timestamp}`, `**Query:** ${entry.query}`, `**Response:** ${entry.response}`]

  const decisions = entry.decisions ?? []
  if (decisions.length > 0) {
    lines.push('**Decisions:**')
    for (const decision of decisions) {
      lines.push(`- ${decision}`)
    }
  }

  lines.push('---')
  return lines.map((line) => `${line}\n`).join('')
}

function entryDate(timestamp: string): string {
  const prefix = timestamp.slice(0, 10)
  if (/^\d{4}-\d{2}-\d{2}$/.test(prefix)) return prefix
  return new Date().toISOString().slice(0, 10)
}
